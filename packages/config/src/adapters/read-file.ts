import fs from "node:fs/promises"
import path from "node:path"
import { ConfigError } from "../core/config-error"

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Read a config file as UTF-8, resolving `file` against `cwd`.
 *
 * @returns `undefined` when the file is absent and not `required`.
 */
export async function readConfigFile(
  source: string,
  file: string,
  required: boolean,
  cwd: string = process.cwd(),
): Promise<string | undefined> {
  try {
    return await fs.readFile(path.resolve(cwd, file), "utf-8")
  } catch (err) {
    if (!required && isMissingFile(err)) return undefined
    throw new ConfigError("config_unreadable", `Cannot read ${file}`, { source, cause: err })
  }
}
