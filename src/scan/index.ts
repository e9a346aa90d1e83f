/**
 * Paginated scanning with retry and parallel segments.
 */

export { scanTable } from './scanner.js';
export type { ScanOptions, PageEvent } from './scanner.js';
