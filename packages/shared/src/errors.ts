/** Base class for failures that abort a pipeline step. */
export class PipelineError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PipelineError'
  }
}

/** A template was filled without a value for one of its required placeholders. */
export class TemplateError extends PipelineError {
  constructor(readonly placeholder: string, readonly nodeHint?: string) {
    super(`missing required placeholder "${placeholder}"${nodeHint ? ` for ${nodeHint}` : ''}`)
    this.name = 'TemplateError'
  }
}

/** A coded field held a code absent from its enum table. */
export class EnumLookupError extends PipelineError {
  constructor(readonly code: string, readonly field: string) {
    super(`unknown ${field} code "${code}"`)
    this.name = 'EnumLookupError'
  }
}
