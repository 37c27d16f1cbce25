export interface HashStore {
  lookup(domain: string): Promise<string | undefined>

  /**
   * Rejects when the record could not be persisted; the previous record is kept in that case.
   */
  update(domain: string, hash: string): Promise<void>
}
