import type { ChangeHandler } from "../../ports/change-handler"

/**
 * Handlers per table, case-insensitive on the table name.
 *
 * Dispatch iterates a snapshot, so handlers may (un)register from inside a
 * handler or while a dispatch is in flight.
 */
export class HandlerRegistry {
  private readonly byTable = new Map<string, Set<ChangeHandler>>()

  /** @returns a function that removes this registration. */
  add(table: string, handler: ChangeHandler): () => void {
    const name = table.toUpperCase()
    let handlers = this.byTable.get(name)

    if (!handlers) {
      handlers = new Set()
      this.byTable.set(name, handlers)
    }
    handlers.add(handler)

    return () => this.remove(table, handler)
  }

  /** Remove `handler`, or every handler of `table` when omitted. */
  remove(table: string, handler?: ChangeHandler): void {
    const name = table.toUpperCase()

    if (handler === undefined) {
      this.byTable.delete(name)
      return
    }

    const handlers = this.byTable.get(name)
    handlers?.delete(handler)
    if (handlers?.size === 0) this.byTable.delete(name)
  }

  has(table: string): boolean {
    return this.byTable.has(table.toUpperCase())
  }

  handlersFor(table: string): ChangeHandler[] {
    return [...(this.byTable.get(table.toUpperCase()) ?? [])]
  }

  clear(): void {
    this.byTable.clear()
  }
}
