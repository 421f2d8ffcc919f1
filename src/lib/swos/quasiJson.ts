import type { Tree, TreeMap } from './types'
import { ParseError } from './errors'

// Firmware responses look like JavaScript object literals rather than JSON:
//   {en:0x3ff,nm:['506f727431','506f727432'],spd:[0x02,0x02]}

const ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
  v: '\v',
  '0': '\0',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '/': '/',
}

const IDENT_START = /[A-Za-z_$!]/
const IDENT_PART = /[A-Za-z0-9_$!.\-]/
const DIGIT = /[0-9]/
const HEX_DIGIT = /[0-9a-fA-F]/

class Parser {
  private pos = 0

  constructor(private readonly src: string) {}

  parseDocument(): Tree {
    this.skipTrivia()
    const value = this.parseValue()
    this.skipTrivia()
    if (this.pos < this.src.length) this.fail(`Unexpected '${this.src[this.pos]}' after value`)
    return value
  }

  private fail(message: string, at = this.pos): never {
    throw new ParseError(message, this.src, at)
  }

  private peek(): string {
    return this.src[this.pos] ?? ''
  }

  private skipTrivia(): void {
    while (this.pos < this.src.length) {
      const ch = this.src[this.pos]
      if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '﻿') {
        this.pos++
      } else if (this.src.startsWith('//', this.pos)) {
        const end = this.src.indexOf('\n', this.pos)
        this.pos = end === -1 ? this.src.length : end + 1
      } else if (this.src.startsWith('/*', this.pos)) {
        const end = this.src.indexOf('*/', this.pos + 2)
        if (end === -1) this.fail('Unterminated comment')
        this.pos = end + 2
      } else {
        return
      }
    }
  }

  private parseValue(): Tree {
    const ch = this.peek()
    if (ch === '{') return this.parseObject()
    if (ch === '[') return this.parseArray()
    if (ch === "'" || ch === '"') return this.parseString()
    if (ch === '-' || ch === '+' || ch === '.' || DIGIT.test(ch)) return this.parseNumber()
    if (IDENT_START.test(ch)) {
      const word = this.parseIdentifier()
      if (word === 'true') return 1
      if (word === 'false') return 0
      if (word === 'null' || word === 'undefined') return null
      return word
    }
    if (ch === '') this.fail('Unexpected end of input')
    return this.fail(`Unexpected '${ch}'`)
  }

  private parseObject(): TreeMap {
    const map: TreeMap = new Map()
    this.pos++ // {
    this.skipTrivia()
    while (this.peek() !== '}') {
      const key = this.parseKey()
      this.skipTrivia()
      if (this.peek() !== ':') this.fail(`Expected ':' after key '${key}'`)
      this.pos++
      this.skipTrivia()
      map.set(key, this.parseValue())
      this.skipTrivia()
      if (this.peek() === ',') {
        this.pos++
        this.skipTrivia()
      } else if (this.peek() !== '}') {
        this.fail("Expected ',' or '}' in object")
      }
    }
    this.pos++ // }
    return map
  }

  private parseKey(): string {
    const ch = this.peek()
    if (ch === "'" || ch === '"') return this.parseString()
    if (DIGIT.test(ch) || ch === '-') return String(this.parseNumber())
    if (IDENT_START.test(ch)) return this.parseIdentifier()
    if (ch === '') this.fail('Unexpected end of input in object')
    return this.fail(`Unexpected '${ch}' where a key was expected`)
  }

  private parseArray(): Tree[] {
    const items: Tree[] = []
    this.pos++ // [
    this.skipTrivia()
    while (this.peek() !== ']') {
      items.push(this.parseValue())
      this.skipTrivia()
      if (this.peek() === ',') {
        this.pos++
        this.skipTrivia()
      } else if (this.peek() !== ']') {
        if (this.peek() === '') this.fail('Unexpected end of input in array')
        this.fail("Expected ',' or ']' in array")
      }
    }
    this.pos++ // ]
    return items
  }

  private parseIdentifier(): string {
    const start = this.pos
    this.pos++
    while (this.pos < this.src.length && IDENT_PART.test(this.src[this.pos])) this.pos++
    return this.src.slice(start, this.pos)
  }

  private parseString(): string {
    const quote = this.src[this.pos]
    const start = this.pos
    this.pos++
    let out = ''
    while (true) {
      if (this.pos >= this.src.length) this.fail('Unterminated string', start)
      const ch = this.src[this.pos++]
      if (ch === quote) return out
      if (ch !== '\\') {
        out += ch
        continue
      }
      const esc = this.src[this.pos++] ?? ''
      if (esc === 'x' || esc === 'u') {
        const len = esc === 'x' ? 2 : 4
        const digits = this.src.slice(this.pos, this.pos + len)
        if (digits.length !== len || ![...digits].every((d) => HEX_DIGIT.test(d))) {
          this.fail(`Invalid \\${esc} escape`, this.pos - 2)
        }
        out += String.fromCharCode(parseInt(digits, 16))
        this.pos += len
      } else if (esc === '\n') {
        // line continuation
      } else if (esc in ESCAPES) {
        out += ESCAPES[esc]
      } else if (esc === '') {
        this.fail('Unterminated string', start)
      } else {
        out += esc
      }
    }
  }

  private parseNumber(): number | bigint {
    const start = this.pos
    let sign = 1
    if (this.peek() === '-' || this.peek() === '+') {
      if (this.peek() === '-') sign = -1
      this.pos++
    }

    if (this.peek() === '0' && (this.src[this.pos + 1] === 'x' || this.src[this.pos + 1] === 'X')) {
      this.pos += 2
      const digitsStart = this.pos
      while (HEX_DIGIT.test(this.peek())) this.pos++
      if (this.pos === digitsStart) this.fail('Expected hex digits after 0x', start)
      const digits = this.src.slice(digitsStart, this.pos)
      const value = parseInt(digits, 16)
      if (Number.isSafeInteger(value)) return sign * value
      const wide = BigInt(`0x${digits}`)
      return sign < 0 ? -wide : wide
    }

    const bodyStart = this.pos
    while (DIGIT.test(this.peek())) this.pos++
    if (this.peek() === '.') {
      this.pos++
      while (DIGIT.test(this.peek())) this.pos++
    }
    if (this.peek() === 'e' || this.peek() === 'E') {
      this.pos++
      if (this.peek() === '-' || this.peek() === '+') this.pos++
      const expStart = this.pos
      while (DIGIT.test(this.peek())) this.pos++
      if (this.pos === expStart) this.fail('Expected exponent digits', start)
    }
    const body = this.src.slice(bodyStart, this.pos)
    const value = Number(body)
    if (body === '' || body === '.' || Number.isNaN(value)) this.fail('Invalid number', start)
    return sign * value
  }
}

/** Parses a firmware response into a tree of numbers, strings, lists and ordered maps. */
export function parseQuasiJson(text: string): Tree {
  return new Parser(text).parseDocument()
}

export function isTreeMap(value: Tree): value is TreeMap {
  return value instanceof Map
}
