import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { FileAuditStore, auditDirectoryName } from '../audit-store.js'

describe('FileAuditStore', () => {
  let root: string | null = null

  afterEach(async () => {
    if (root) await rm(root, { recursive: true, force: true })
    root = null
  })

  it('makes route keys safe for directory names', () => {
    expect(auditDirectoryName('chennai:bangalore:2024-01-10')).toBe('chennai_bangalore_2024-01-10')
  })

  it('writes each page under its route directory', async () => {
    root = await mkdtemp(join(tmpdir(), 'harvest-audit-'))
    const store = new FileAuditStore(root)

    await store.write({
      routeKey: 'chennai:bangalore',
      pageIndex: 3,
      url: 'https://www.redbus.in/search?page=4',
      html: '<html>page four</html>',
      fetchedAt: new Date('2024-01-10T06:00:00Z'),
      byteSize: 22,
      contentHash: 'hash',
    })

    expect(store.pathFor('chennai:bangalore', 3)).toBe(join(root, 'chennai_bangalore', '3.html'))
    await expect(readFile(join(root, 'chennai_bangalore', '3.html'), 'utf8')).resolves.toBe('<html>page four</html>')
  })
})
