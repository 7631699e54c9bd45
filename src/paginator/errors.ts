export class PaginatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The paginator has nothing to render (empty page set). */
export class RenderError extends PaginatorError {}

/** A lifecycle operation was called in the wrong state, e.g. `stop()` before `send()`. */
export class StateError extends PaginatorError {}

export class ConfigError extends PaginatorError {}
