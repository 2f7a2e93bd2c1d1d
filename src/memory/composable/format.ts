import type { ChatMessage } from '../types.js'
import {
  DEFAULT_COMPOSITION_TEMPLATES,
  sourceFooter,
  sourceHeader,
  type CompositionTemplates,
} from './templates.js'

/**
 * Render a message as a single `ROLE: content` line.
 */
export function formatMessageLine(message: ChatMessage): string {
  return `\t${message.role.toUpperCase()}: ${message.content}\n`
}

/**
 * Format secondary chat histories into one injectable block.
 *
 * Empty histories are skipped; section numbering follows the remaining
 * histories. Returns an empty string when nothing is left to inject.
 */
export function formatSecondaryHistories(
  histories: ChatMessage[][],
  templates: Pick<CompositionTemplates, 'introMessage' | 'outroMessage'> = DEFAULT_COMPOSITION_TEMPLATES
): string {
  const nonEmpty = histories.filter((history) => history.length > 0)
  if (nonEmpty.length === 0) return ''

  let formatted = `\n\n${templates.introMessage}\n`

  nonEmpty.forEach((history, ix) => {
    formatted += `\n${sourceHeader(ix + 1)}\n\n`
    for (const message of history) {
      formatted += formatMessageLine(message)
    }
    formatted += `\n${sourceFooter(ix + 1)}\n\n`
  })

  return formatted + templates.outroMessage
}

/**
 * Strip a previously injected block from system message content.
 *
 * Keeps everything before the first occurrence of the marker, without
 * trailing whitespace.
 */
export function stripInjectedBlock(content: string, marker: string): string {
  const markerIndex = content.indexOf(marker)
  const prefix = markerIndex === -1 ? content : content.slice(0, markerIndex)
  return prefix.trimEnd()
}
