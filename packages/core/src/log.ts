/**
 * Log a warning with a consistent format: [tag] message
 */
export function logWarn(tag: string, message: string): void {
  console.warn(`[${tag}] ${message}`);
}
