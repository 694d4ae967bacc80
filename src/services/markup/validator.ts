import { MarkupSyntaxError, parseCommandName, parseMarkup, type MarkupElement, type MarkupToken } from './parser'

export const MAX_MARKUP_LENGTH = 10_000

const ALLOWED_ELEMENTS: Record<string, readonly string[]> = {
  mark: ['name'],
  break: ['time'],
  speak: [],
  emphasis: ['level'],
  prosody: ['rate', 'pitch', 'volume'],
}

const ALLOWED_COMMANDS = new Set(['cmd:behaviour-tree', 'cmd:playaudio', 'cmd:external', 'cmd:stop', 'cmd:interrupt'])

export type MarkupValidationResult = { valid: true } | { valid: false; error: string }

export interface MarkupValidationOptions {
  /** 既定は MAX_MARKUP_LENGTH。内部で生成したマークアップは Infinity で長さを見ない */
  maxLength?: number
}

const checkElement = (element: MarkupElement): string | null => {
  const allowedAttributes = ALLOWED_ELEMENTS[element.tag]
  if (!allowedAttributes) {
    return `Disallowed element: ${element.tag}`
  }
  for (const attribute of Object.keys(element.attributes)) {
    if (!allowedAttributes.includes(attribute)) {
      return `Disallowed attribute '${attribute}' in element '${element.tag}'`
    }
  }
  if (element.tag === 'mark' && element.kind !== 'close') {
    const name = element.attributes.name ?? ''
    if (!name || !ALLOWED_COMMANDS.has(parseCommandName(name).command)) {
      return `Invalid mark command: ${name}`
    }
  }
  return null
}

/**
 * 端末へ送る前のマークアップ検査
 * プレーンテキストはそのまま通し、要素は許可リストと開閉の対応を確認する
 */
export const validateMarkup = (markup: string, options: MarkupValidationOptions = {}): MarkupValidationResult => {
  if (!markup) return { valid: true }
  const maxLength = options.maxLength ?? MAX_MARKUP_LENGTH
  if (markup.length > maxLength) {
    return { valid: false, error: `Markup too long (max ${maxLength} characters)` }
  }

  let tokens: MarkupToken[]
  try {
    tokens = parseMarkup(markup)
  } catch (error) {
    if (error instanceof MarkupSyntaxError) {
      return { valid: false, error: `Invalid markup structure: ${error.message}` }
    }
    throw error
  }

  const openTags: string[] = []
  for (const token of tokens) {
    if (token.kind === 'text') continue
    const problem = checkElement(token)
    if (problem) return { valid: false, error: problem }

    if (token.kind === 'open') {
      openTags.push(token.tag)
    } else if (token.kind === 'close') {
      const expected = openTags.pop()
      if (expected !== token.tag) {
        return { valid: false, error: `Invalid markup structure: unexpected </${token.tag}>` }
      }
    }
  }
  if (openTags.length > 0) {
    return { valid: false, error: `Invalid markup structure: unclosed <${openTags[openTags.length - 1]}>` }
  }
  return { valid: true }
}
