/**
 * Composition templates.
 *
 * The intro message doubles as the marker used to strip a previously
 * injected block from a system message. Any occurrence of it in real
 * content is treated as the start of an injected block.
 */

export const DEFAULT_INTRO_HISTORY_MESSAGE =
  'Below are a set of relevant dialogues retrieved from potentially several memory sources:'

export const DEFAULT_OUTRO_HISTORY_MESSAGE =
  'This is the end of the retrieved message dialogues.'

export const DEFAULT_SYSTEM_MESSAGE = 'You are a helpful assistant.'

/**
 * Section header for the i-th (1-based) secondary source.
 */
export function sourceHeader(index: number): string {
  return `=====Relevant messages from memory source ${index}=====`
}

/**
 * Section footer for the i-th (1-based) secondary source.
 */
export function sourceFooter(index: number): string {
  return `=====End of relevant messages from memory source ${index}======`
}

/**
 * Overridable composition text.
 */
export interface CompositionTemplates {
  introMessage: string
  outroMessage: string
  defaultSystemMessage: string
}

export const DEFAULT_COMPOSITION_TEMPLATES: CompositionTemplates = {
  introMessage: DEFAULT_INTRO_HISTORY_MESSAGE,
  outroMessage: DEFAULT_OUTRO_HISTORY_MESSAGE,
  defaultSystemMessage: DEFAULT_SYSTEM_MESSAGE,
}
