/**
 * Runs once in the parent process before any worker starts, so the time
 * zone applies to every test file's Date formatting.
 */
export default function globalSetup(): void {
  process.env.TZ = 'UTC';
}
