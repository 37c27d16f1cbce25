import { mkdir }     from 'node:fs/promises'
import { readFile }  from 'node:fs/promises'
import { rename }    from 'node:fs/promises'
import { writeFile } from 'node:fs/promises'
import { dirname }   from 'node:path'

import { Logger }    from '@cert-sync/logger'

import { HashStore } from './hash-store.interfaces'

const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'

const parseRecords = (content: string): Map<string, string> => {
  const parsed: unknown = JSON.parse(content)

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new SyntaxError('Hash table is not an object')
  }

  const records = new Map<string, string>()

  for (const [domain, hash] of Object.entries(parsed)) {
    if (typeof hash === 'string') {
      records.set(domain, hash)
    }
  }

  return records
}

/**
 * Domain to content hash table kept in one file. Writes go to a sibling file that then
 * replaces the table, so a crash leaves either the old or the new table on disk.
 */
export class FileHashStore implements HashStore {
  private readonly logger = new Logger(FileHashStore.name)

  #records?: Map<string, string>

  constructor(private readonly path: string) {}

  async lookup(domain: string): Promise<string | undefined> {
    const records = await this.load()

    return records.get(domain)
  }

  async update(domain: string, hash: string): Promise<void> {
    const records = new Map(await this.load())

    records.set(domain, hash)

    await this.persist(records)

    this.#records = records
  }

  async entries(): Promise<ReadonlyMap<string, string>> {
    return new Map(await this.load())
  }

  private async load(): Promise<Map<string, string>> {
    if (!this.#records) {
      this.#records = await this.read()
    }

    return this.#records
  }

  private async read(): Promise<Map<string, string>> {
    try {
      return parseRecords(await readFile(this.path, 'utf8'))
    } catch (error) {
      if (isMissingFile(error)) {
        return new Map()
      }

      if (error instanceof SyntaxError) {
        this.logger.warn(`Ignoring unreadable hash table ${this.path}: ${error.message}`)

        return new Map()
      }

      throw error
    }
  }

  private async persist(records: Map<string, string>): Promise<void> {
    const next = `${this.path}.${process.pid}.tmp`

    await mkdir(dirname(this.path), { recursive: true, mode: 0o700 })
    await writeFile(next, JSON.stringify(Object.fromEntries(records), null, 2), { mode: 0o600 })
    await rename(next, this.path)
  }
}
