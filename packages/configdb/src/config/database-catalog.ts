import { fileURLToPath } from "node:url"
import { JsonSource, loadConfig } from "@switchconf/config"
import { BaseError } from "@switchconf/errors"
import { z } from "zod"
import type { DatabaseInfo } from "../ports/database"

const instanceSchema = z.object({
  hostname: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  unix_socket_path: z.string().min(1).optional(),
})

const databaseSchema = z.object({
  id: z.number().int().nonnegative(),
  separator: z.string().length(1),
  instance: z.string().min(1),
})

export const databaseCatalogSchema = z
  .object({
    INSTANCES: z.record(z.string(), instanceSchema),
    DATABASES: z.record(z.string(), databaseSchema),
    VERSION: z.string(),
  })
  .superRefine((doc, ctx) => {
    for (const [name, db] of Object.entries(doc.DATABASES)) {
      if (!Object.hasOwn(doc.INSTANCES, db.instance)) {
        ctx.addIssue({
          code: "custom",
          path: ["DATABASES", name, "instance"],
          message: `Unknown instance "${db.instance}"`,
        })
      }
    }
  })

export type DatabaseCatalogDocument = z.infer<typeof databaseCatalogSchema>

export const bundledCatalogFile = fileURLToPath(new URL("../../config/database-config.json", import.meta.url))

/**
 * Logical database names mapped to their numeric id and key separator.
 */
export class DatabaseCatalog {
  constructor(private readonly doc: DatabaseCatalogDocument) {}

  static fromDocument(doc: unknown): DatabaseCatalog {
    return new DatabaseCatalog(databaseCatalogSchema.parse(doc))
  }

  /** @throws ConfigError when the file is unreadable or invalid. */
  static async load(file: string = bundledCatalogFile, cwd?: string): Promise<DatabaseCatalog> {
    const config = await loadConfig({
      schema: databaseCatalogSchema,
      sources: [new JsonSource({ file, required: true, ...(cwd !== undefined && { cwd }) })],
    })

    return new DatabaseCatalog(config.value)
  }

  get version(): string {
    return this.doc.VERSION
  }

  get names(): string[] {
    return Object.keys(this.doc.DATABASES)
  }

  /** @throws BaseError `unknown_database` for names not in the catalog. */
  resolve(name: string): DatabaseInfo {
    const db = this.doc.DATABASES[name]

    if (!db) {
      throw new BaseError(`Database "${name}" is not in the catalog`, {
        code: "unknown_database",
        context: { dbName: name, known: this.names },
        isOperational: false,
      })
    }

    return { name, id: db.id, separator: db.separator }
  }
}
