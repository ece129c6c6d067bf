import type {ScriptDownloader} from './types.js'
import {Buffer} from 'node:buffer'
import * as fs from 'node:fs/promises'

const USER_AGENT = 'git-ssh-bootstrap'

/**
 * Download `url` to `dest`. Non-2xx responses are errors. The file is created
 * exclusively, so an existing path is never overwritten.
 */
export async function downloadScript(url: string, dest: string): Promise<void> {
  const response = await fetch(url, {
    headers: {
      Accept: '*/*',
      'User-Agent': USER_AGENT,
    },
    redirect: 'follow',
  })

  if (!response.ok) {
    throw new Error(`Unexpected HTTP response: ${response.status} ${response.statusText}`.trim())
  }

  const body = Buffer.from(await response.arrayBuffer())
  await fs.writeFile(dest, body, {flag: 'wx', mode: 0o600})
}

export function createScriptDownloader(): ScriptDownloader {
  return {download: downloadScript}
}

/**
 * The destination already existed, so nothing was written and the file is not
 * ours to remove.
 */
export function isExistingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST'
}
