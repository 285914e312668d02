/**
 * Time utilities for consistent date handling
 */

import { format } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function getRunId(date: Date, hash: string): string {
  return `${formatDate(date)}__${hash.substring(0, 8)}`;
}
