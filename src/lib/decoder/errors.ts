export class FixLogError extends Error {
  constructor(message: string, public originalError?: unknown) {
    super(message)
    this.name = 'FixLogError'
  }
}

export class SchemaUnavailableError extends FixLogError {
  constructor(public readonly versionId: string, originalError?: unknown) {
    const reason = originalError instanceof Error ? originalError.message : String(originalError)
    super(`Schema for ${versionId} is unavailable: ${reason}`, originalError)
    this.name = 'SchemaUnavailableError'
  }
}

export class ConfigError extends FixLogError {
  constructor(message: string, originalError?: unknown) {
    super(message, originalError)
    this.name = 'ConfigError'
  }
}
