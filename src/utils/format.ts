/**
 * Local calendar date as YYYYMMDD, like `date +%Y%m%d`.
 */
export function formatDateStamp(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0')
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${year}${month}${day}`
}

/**
 * Human name for the remote host in operator messages.
 */
export function formatRemoteName(host: string): string {
  return host.toLowerCase() === 'github.com' ? 'GitHub' : host
}
