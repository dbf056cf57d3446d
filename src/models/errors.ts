/**
 * Error kinds surfaced by the renderer.
 *
 * Nothing in the pipeline recovers from these: a malformed description or a
 * missing file fails the whole render.
 */

export class DialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed declarative input: unknown element type, bad enumerated value,
 * out-of-range number, bad color/gradient, bad time or date string.
 */
export class ConfigError extends DialError {}

/**
 * A file the configuration points at (font, background image, config file)
 * could not be found or read.
 */
export class ResourceError extends DialError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${message}: ${path}`);
    this.path = path;
  }
}
