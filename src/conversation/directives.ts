import type { ButtonsDirective, DirectiveOption, ListDirective, NoopDirective, TextDirective } from './types.js'

export const MAX_LIST_OPTIONS = 10
export const MAX_BUTTON_OPTIONS = 3

export function optionId(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, '_')
}

function toOptions(titles: readonly string[], max: number): DirectiveOption[] {
  return titles.slice(0, max).map(title => ({ id: optionId(title), title }))
}

export function textDirective(recipient: string, body: string): TextDirective {
  return { form: 'text', recipient, body }
}

export function listDirective(recipient: string, body: string, title: string, titles: readonly string[]): ListDirective {
  return { form: 'list', recipient, body, title, options: toOptions(titles, MAX_LIST_OPTIONS) }
}

export function buttonsDirective(recipient: string, body: string, titles: readonly string[]): ButtonsDirective {
  return { form: 'buttons', recipient, body, options: toOptions(titles, MAX_BUTTON_OPTIONS) }
}

export function noopDirective(recipient: string): NoopDirective {
  return { form: 'noop', recipient }
}
