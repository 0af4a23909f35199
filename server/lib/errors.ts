/**
 * Error kinds surfaced to the HTTP boundary.
 */

/** I/O failure while scanning or appending to the survey store. */
export class StorageError extends Error {
  readonly kind = 'storage_error'
  readonly status = 500

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'StorageError'
  }
}

/** Invalid runtime configuration; `keys` lists every offending setting. */
export class ConfigError extends Error {
  readonly keys: string[]

  constructor(message: string, keys: string[]) {
    super(message)
    this.name = 'ConfigError'
    this.keys = keys
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
