import JSZip from 'jszip'
import { Blob } from 'node:buffer'
import { existsSync } from 'node:fs'
import { readdir, readFile, rm, stat, unlink, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import { fetch as undiciFetch, FormData, type RequestInit } from 'undici'
import { logger } from '../logger'
import type { Fetch } from './polling-client'
import { VIDEO_DIRNAME, type Task } from './types'

export const LARGE_FILE_THRESHOLD = 100000 // bytes
export const RESULT_ARCHIVE_NAME = 'result.zip'

export type UploadFields = Record<string, string>

export interface UploaderConfig {
  server: string
  location: string
  key?: string
  /** Agent directory, removed once the last task of a job has been posted */
  agentDir: string
  timeout?: number // ms, defaults to 5 minutes
  fetch?: Fetch
}

/**
 * Packages a task's output and posts it to the coordinator: frames and large files
 * individually, everything else in one archive attached to the workdone event.
 */
export class Uploader {
  private config: Required<Omit<UploaderConfig, 'key'>> & Pick<UploaderConfig, 'key'>

  constructor(config: UploaderConfig) {
    this.config = {
      timeout: 300000,
      fetch: undiciFetch,
      ...config,
    }
  }

  async upload(task: Task): Promise<void> {
    logger.info(`Uploading result for test ${task.jobId} run ${task.run}${task.cached ? ' (repeat view)' : ''}`)
    const fields = this.taskFields(task)

    try {
      let archivePath: string | undefined
      try {
        archivePath = await this.packageResults(task, fields)
      } catch (error) {
        // The completion request still goes out, only without the archive
        logger.critical(`Failed to package results for test ${task.jobId} run ${task.run}:`, error)
      }

      const doneFields: UploadFields = { ...fields }
      if (task.error) {
        doneFields.error = task.error
      }
      if (task.done) {
        doneFields.done = '1'
      }

      logger.debug('Uploading result zip')
      await this.postMultipart(this.endpoint('workdone.php'), doneFields, archivePath, RESULT_ARCHIVE_NAME)
    } finally {
      // Never leave task directories lying around, whatever happened above
      await removeDir(task.workingDir)
      if (task.done) {
        await removeDir(this.config.agentDir)
      }
    }
  }

  /**
   * Sends `fields` as query parameters and, when `filePath` exists, the file as a
   * multipart attachment. Resolves to false on transport or filesystem errors.
   */
  async postMultipart(url: string, fields: UploadFields, filePath?: string, filename?: string): Promise<boolean> {
    const target = new URL(url)
    Object.entries(fields).forEach(([key, value]) => target.searchParams.set(key, value))

    try {
      const init: RequestInit = {
        method: 'POST',
        signal: AbortSignal.timeout(this.config.timeout),
      }

      if (filePath !== undefined && (await isFile(filePath))) {
        const form = new FormData()
        form.append('file', new Blob([await readFile(filePath)]), filename ?? path.basename(filePath))
        init.body = form
      }

      const response = await this.config.fetch(target.toString(), init)
      if (!response.ok) {
        logger.warn(`Upload to ${target.pathname} returned HTTP ${response.status}`)
      }
      await response.text()
      return true
    } catch (error) {
      logger.critical(`Upload: ${error instanceof Error ? error.message : String(error)}`)
      return false
    }
  }

  private taskFields(task: Task): UploadFields {
    const fields: UploadFields = {
      id: task.jobId,
      location: this.config.location,
    }
    if (this.config.key !== undefined) {
      fields.key = this.config.key
    }
    fields.run = String(task.run)
    fields.cached = task.cached ? '1' : '0'
    return fields
  }

  /**
   * Uploads video frames and large files, then archives everything else.
   * Returns the archive path, or undefined when nothing was left to archive.
   */
  private async packageResults(task: Task, fields: UploadFields): Promise<string | undefined> {
    if (!existsSync(task.workingDir)) {
      return undefined
    }

    const resultImageUrl = this.endpoint('resultimage.php')

    // Frame sequences are always sent one by one
    for (const framePath of await listFiles(path.join(task.workingDir, VIDEO_DIRNAME))) {
      const filename = path.basename(framePath)
      logger.debug(`Uploading ${filename}`)
      await this.postMultipart(resultImageUrl, fields, framePath, task.prefix + filename)
    }

    const needsArchive: string[] = []
    for (const filePath of await listFiles(task.workingDir)) {
      const { size } = await stat(filePath)
      if (size <= LARGE_FILE_THRESHOLD) {
        needsArchive.push(filePath)
        continue
      }

      const filename = path.basename(filePath)
      logger.debug(`Uploading ${filename}`)
      if (await this.postMultipart(resultImageUrl, fields, filePath, filename)) {
        await unlink(filePath)
      } else {
        needsArchive.push(filePath)
      }
    }

    if (needsArchive.length === 0) {
      return undefined
    }

    const archivePath = path.join(task.workingDir, RESULT_ARCHIVE_NAME)
    await writeArchive(archivePath, needsArchive)
    return archivePath
  }

  private endpoint(name: string): string {
    return new URL(name, this.config.server).toString()
  }
}

/**
 * Deflates `files` into one zip at `archivePath`. The files are deleted only
 * once the archive has been written.
 */
async function writeArchive(archivePath: string, files: string[]): Promise<void> {
  const zip = new JSZip()

  for (const filePath of files) {
    const filename = path.basename(filePath)
    logger.debug(`Compressing ${filename}`)
    zip.file(filename, await readFile(filePath))
  }

  const content = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' })
  await writeFile(archivePath, content)
  await Promise.all(files.map((filePath) => unlink(filePath)))
}

// Regular files directly inside `dir`; empty when the directory does not exist
async function listFiles(dir: string): Promise<string[]> {
  if (!existsSync(dir)) {
    return []
  }
  const entries = await readdir(dir, { withFileTypes: true })
  return entries.filter((entry) => entry.isFile()).map((entry) => path.join(dir, entry.name))
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile()
  } catch {
    return false
  }
}

async function removeDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true })
  } catch (error) {
    logger.debug(`Failed to remove ${dir}:`, error)
  }
}

export function createUploader(config: UploaderConfig): Uploader {
  return new Uploader(config)
}
