/**
 * Whole-file read/write reporting failures as errno Results.
 */

import { readFile, writeFile } from 'node:fs/promises'
import { Ok } from '../result/result.js'
import type { Result } from '../result/result.js'
import { captureErrno } from '../result/errno.js'
import { errnoError } from '../result/factories.js'

export async function readFileToString(path: string): Promise<Result<string>> {
  try {
    return Ok(await readFile(path, 'utf-8'))
  } catch (err) {
    captureErrno(err)
    return errnoError().append('failed to read ', path).toResult()
  }
}

export async function writeStringToFile(content: string, path: string): Promise<Result<void>> {
  try {
    await writeFile(path, content, 'utf-8')
    return Ok()
  } catch (err) {
    captureErrno(err)
    return errnoError().append('failed to write ', path).toResult()
  }
}
