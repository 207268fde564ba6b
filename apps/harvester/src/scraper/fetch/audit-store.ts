/**
 * Raw page audit store
 *
 * Keeps the rendered HTML of every fetched page on disk, keyed by route and page
 * index, whether or not it later parses. Audit copies are never read back by the
 * pipeline.
 */

import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import type { RawPage } from '../types.js'

export interface AuditStore {
  write(page: RawPage): Promise<void>
}

/**
 * Route keys contain `:`; keep directory names portable.
 */
export function auditDirectoryName(routeKey: string): string {
  return routeKey.replace(/[^a-zA-Z0-9_-]+/g, '_')
}

export class FileAuditStore implements AuditStore {
  constructor(private readonly rootDir: string) {}

  pathFor(routeKey: string, pageIndex: number): string {
    return join(this.rootDir, auditDirectoryName(routeKey), `${pageIndex}.html`)
  }

  async write(page: RawPage): Promise<void> {
    const dir = join(this.rootDir, auditDirectoryName(page.routeKey))
    await mkdir(dir, { recursive: true })
    await writeFile(this.pathFor(page.routeKey, page.pageIndex), page.html, 'utf8')
  }
}
