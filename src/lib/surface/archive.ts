import * as fs from 'fs/promises'
import * as path from 'path'
import { parse as parseYaml } from 'yaml'
import { ConfigError, SurfaceIOError } from '../utils/errors'

const BUNDLE_EXTENSIONS = new Set(['.json', '.yml', '.yaml'])

/** Directory entries read at the same time. */
export const ENTRY_READ_BATCH_SIZE = 64

/**
 * Entries of a candidate surface archive, keyed by `/`-separated entry path.
 *
 * An archive is either a directory, where every file is an entry holding its raw text,
 * or a single bundle file whose `entries` object maps entry paths to definitions.
 */
export class SurfaceArchive {
  private entries: Map<string, unknown>

  constructor(public readonly source: string, entries: Iterable<[string, unknown]>) {
    this.entries = new Map(entries)
  }

  /**
   * Opens an archive directory or bundle file. All entries are read upfront.
   * @throws SurfaceIOError if the archive cannot be read.
   * @throws ConfigError if a bundle file has no `entries` object.
   */
  static async open(archivePath: string): Promise<SurfaceArchive> {
    const absolutePath = path.resolve(archivePath)
    try {
      const stat = await fs.stat(absolutePath)
      if (stat.isDirectory()) {
        return new SurfaceArchive(absolutePath, await readDirectoryEntries(absolutePath))
      }
      const content = await fs.readFile(absolutePath, 'utf-8')
      return new SurfaceArchive(absolutePath, parseBundle(content, absolutePath))
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error
      }
      throw new SurfaceIOError(archivePath, error)
    }
  }

  public entryNames(): string[] {
    return [...this.entries.keys()]
  }

  public has(entryName: string): boolean {
    return this.entries.has(entryName)
  }

  public read(entryName: string): unknown {
    return this.entries.get(entryName)
  }

  public get size(): number {
    return this.entries.size
  }
}

function parseBundle(content: string, bundlePath: string): Array<[string, unknown]> {
  const ext = path.extname(bundlePath).toLowerCase()
  if (!BUNDLE_EXTENSIONS.has(ext)) {
    throw new ConfigError('E_ARCHIVE_FORMAT', `Unsupported archive file: ${bundlePath} (expected a directory or a .json/.yml/.yaml bundle)`)
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError('E_ARCHIVE_FORMAT', `Failed to parse archive bundle ${bundlePath}: ${message}`)
  }

  if (typeof parsed !== 'object' || parsed === null || !('entries' in parsed)) {
    throw new ConfigError('E_ARCHIVE_FORMAT', `Invalid archive bundle ${bundlePath}: expected an "entries" object.`)
  }
  const entries = parsed.entries
  if (typeof entries !== 'object' || entries === null || Array.isArray(entries)) {
    throw new ConfigError('E_ARCHIVE_FORMAT', `Invalid archive bundle ${bundlePath}: expected an "entries" object.`)
  }
  return Object.entries(entries)
}

async function readDirectoryEntries(root: string): Promise<Array<[string, unknown]>> {
  const files = await findEntryFiles(root)
  const entries: Array<[string, unknown]> = []
  // At most ENTRY_READ_BATCH_SIZE files are open at once
  for (let start = 0; start < files.length; start += ENTRY_READ_BATCH_SIZE) {
    const batch = files.slice(start, start + ENTRY_READ_BATCH_SIZE)
    entries.push(...await Promise.all(batch.map(async (filePath): Promise<[string, unknown]> => {
      const entryName = path.relative(root, filePath).split(path.sep).join('/')
      return [entryName, await fs.readFile(filePath, 'utf-8')]
    })))
  }
  return entries
}

/**
 * Recursively finds all files below a directory, in a stable order.
 */
async function findEntryFiles(dir: string, ignoreDirs: Set<string> = new Set(['.git', 'node_modules'])): Promise<string[]> {
  let results: string[] = []
  const list = await fs.readdir(dir, { withFileTypes: true })
  list.sort((a, b) => a.name.localeCompare(b.name))

  for (const dirent of list) {
    const fullPath = path.join(dir, dirent.name)
    if (dirent.isDirectory()) {
      if (!ignoreDirs.has(dirent.name)) {
        results = results.concat(await findEntryFiles(fullPath, ignoreDirs))
      }
    } else if (dirent.isFile()) {
      results.push(fullPath)
    }
  }
  return results
}
