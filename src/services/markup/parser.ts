export type MarkupToken =
  | { kind: 'text'; text: string; index: number }
  | { kind: 'open' | 'close' | 'self'; tag: string; attributes: Record<string, string>; index: number }

export type MarkupElement = Extract<MarkupToken, { kind: 'open' | 'close' | 'self' }>

export interface ParsedCommand {
  command: string
  data: Record<string, string>
}

export class MarkupSyntaxError extends Error {
  constructor(
    message: string,
    public readonly index: number
  ) {
    super(message)
    this.name = 'MarkupSyntaxError'
  }
}

// <tag attr="value" ... /> / </tag> を1要素として切り出す。属性値は二重引用符のみ
const TAG_PATTERN = /<\s*(\/)?\s*([A-Za-z][\w-]*)((?:\s+[^\s=/>]+\s*=\s*"[^"]*")*)\s*(\/)?\s*>/g
const ATTRIBUTE_PATTERN = /([^\s=/>]+)\s*=\s*"([^"]*)"/g

const parseAttributes = (source: string): Record<string, string> => {
  const attributes: Record<string, string> = {}
  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    attributes[match[1]] = match[2]
  }
  return attributes
}

const pushText = (tokens: MarkupToken[], text: string, index: number) => {
  if (!text) return
  const stray = text.search(/[<>]/)
  if (stray !== -1) {
    throw new MarkupSyntaxError(`Malformed tag near position ${index + stray}`, index + stray)
  }
  if (text.trim()) {
    tokens.push({ kind: 'text', text, index })
  }
}

/**
 * マークアップを要素とテキストのトークン列に分解する
 * 空白で区切られたトークンではなく、タグ単位で構造的に切り出す
 */
export const parseMarkup = (markup: string): MarkupToken[] => {
  const tokens: MarkupToken[] = []
  let cursor = 0
  for (const match of markup.matchAll(TAG_PATTERN)) {
    const index = match.index ?? 0
    pushText(tokens, markup.slice(cursor, index), cursor)
    const [, closing, tag, attributeSource, selfClosing] = match
    if (closing && (selfClosing || attributeSource.trim())) {
      throw new MarkupSyntaxError(`Malformed closing tag </${tag}>`, index)
    }
    tokens.push({
      kind: closing ? 'close' : selfClosing ? 'self' : 'open',
      tag,
      attributes: parseAttributes(attributeSource),
      index,
    })
    cursor = index + match[0].length
  }
  pushText(tokens, markup.slice(cursor), cursor)
  return tokens
}

export const findElements = (markup: string, tag: string): MarkupElement[] =>
  parseMarkup(markup).filter(
    (token): token is MarkupElement => token.kind !== 'text' && token.kind !== 'close' && token.tag === tag
  )

/**
 * mark の name 属性を command と data に分解する
 * "cmd:behaviour-tree,data:{+duration+:1.5,+behaviour+:+Bht_Spin_360+}"
 *   → { command: 'cmd:behaviour-tree', data: { duration: '1.5', behaviour: 'Bht_Spin_360' } }
 */
export const parseCommandName = (name: string): ParsedCommand => {
  const separator = name.indexOf(',')
  const command = (separator === -1 ? name : name.slice(0, separator)).trim()
  const data: Record<string, string> = {}
  if (separator === -1) {
    return { command, data }
  }

  const payload = name.slice(separator + 1).trim()
  const body = /^data:\s*\{(.*)\}$/s.exec(payload)
  if (!body) {
    return { command, data }
  }
  for (const field of body[1].split(',')) {
    const entry = /^\s*\+([^+]+)\+\s*:\s*(.*?)\s*$/.exec(field)
    if (!entry) continue
    const [, key, rawValue] = entry
    const quotedValue = /^\+(.*)\+$/.exec(rawValue)
    data[key] = quotedValue ? quotedValue[1] : rawValue
  }
  return { command, data }
}
