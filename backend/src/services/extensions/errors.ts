/** Errors raised by package and extension management. */

/** The package type has no extension support, or the extension cannot be installed this way. */
export class NotSupportedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotSupportedError';
  }
}

export class PackageNotFoundError extends Error {
  constructor(readonly packageId: string) {
    super(`Package not found: ${packageId}`);
    this.name = 'PackageNotFoundError';
  }
}
