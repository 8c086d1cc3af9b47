import { TemplateError } from './errors.js'

export interface McfTemplate {
  /** One `property: value` per line, placeholders written as `{name}`. */
  text: string
  required: readonly string[]
}

export type TemplateValues = Readonly<Record<string, string | undefined>>

const PLACEHOLDER = /\{(\w+)\}/g

const placeholdersOf = (line: string): string[] =>
  Array.from(line.matchAll(PLACEHOLDER), m => m[1])

/**
 * Substitute `values` into `template`.
 *
 * A line is kept only when every placeholder on it has a non-empty value;
 * lines without placeholders are always kept. Throws `TemplateError` when a
 * required placeholder has no value. The result ends with a newline.
 */
export function fillTemplate(template: McfTemplate, values: TemplateValues): string {
  const has = (name: string) => {
    const v = values[name]
    return v !== undefined && v !== ''
  }

  for (const name of template.required) {
    if (!has(name)) {
      throw new TemplateError(name, has('dcid') ? values.dcid : undefined)
    }
  }

  const lines: string[] = []
  for (const line of template.text.split('\n')) {
    if (!line.trim()) continue
    const names = placeholdersOf(line)
    if (!names.every(has)) continue
    lines.push(line.replace(PLACEHOLDER, (_, name: string) => values[name] ?? ''))
  }
  return lines.join('\n') + '\n'
}
