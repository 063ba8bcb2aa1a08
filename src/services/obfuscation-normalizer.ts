export interface NormalizationResult {
  normalizedText: string
  transformations: string[]
  signalFlags: string[]
}

const CONTROL_OR_INVISIBLE_RE =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\u00AD\u200B-\u200F\u202A-\u202E\u2060\u2066-\u2069\uFEFF]/g
const NON_WORD_RE = /[^a-z0-9]+/g
const WORD_CHAR_RE = /[a-z0-9]/
const LATIN_SCRIPT_RE = /\p{Script=Latin}/u
const TOKEN_RE = /[\p{L}\p{M}\p{N}]+/gu

// Look-alikes frequently used in mixed-script obfuscation attempts.
const CONFUSABLES: Record<string, string> = {
  а: "a",
  А: "A", // Cyrillic a
  е: "e",
  Е: "E", // Cyrillic e
  о: "o",
  О: "O", // Cyrillic o
  р: "p",
  Р: "P", // Cyrillic er
  с: "c",
  С: "C", // Cyrillic es
  у: "y",
  У: "Y", // Cyrillic u
  х: "x",
  Х: "X", // Cyrillic ha
  і: "i",
  І: "I", // Cyrillic i
  ј: "j",
  Ј: "J", // Cyrillic je
  ԁ: "d",
  ԛ: "q",
  α: "a",
  Α: "A", // Greek alpha
  β: "b",
  Β: "B",
  ε: "e",
  Ε: "E",
  ι: "i",
  Ι: "I",
  κ: "k",
  Κ: "K",
  ο: "o",
  Ο: "O", // Greek omicron
  ρ: "p",
  Ρ: "P",
  τ: "t",
  Τ: "T",
  υ: "u",
  ν: "v",
}

const LEET_DIGITS: Record<string, string> = {
  "0": "o",
  "1": "i",
  "3": "e",
  "4": "a",
  "5": "s",
  "6": "g",
  "7": "t",
  "8": "b",
  "9": "g",
}

// Symbols only fold when they sit inside a word; "prompt!" keeps its "!" as punctuation.
const LEET_SYMBOLS: Record<string, string> = {
  "@": "a",
  $: "s",
  "!": "i",
  "|": "l",
}

function decodeHtmlEntities(input: string): string {
  return input
    .replace(/&nbsp;/gi, " ")
    .replace(/&amp;/gi, "&")
    .replace(/&lt;/gi, "<")
    .replace(/&gt;/gi, ">")
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'")
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => fromCodePoint(Number.parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => fromCodePoint(Number.parseInt(dec, 10)))
}

function fromCodePoint(value: number): string {
  if (!Number.isFinite(value) || value < 0 || value > 0x10ffff) {
    return ""
  }

  return String.fromCodePoint(value)
}

function isMixedScriptToken(token: string): boolean {
  let hasLatin = false
  let hasConfusable = false

  for (const char of token) {
    if (CONFUSABLES[char]) {
      hasConfusable = true
    } else if (LATIN_SCRIPT_RE.test(char)) {
      hasLatin = true
    }
  }

  return hasLatin && hasConfusable
}

// Only tokens mixing Latin with look-alikes are rewritten; a plain Cyrillic or Greek word stays as it is.
function mapMixedScriptConfusables(input: string): { text: string; replacedCount: number } {
  let replacedCount = 0

  const text = input.replace(TOKEN_RE, (token) => {
    if (!isMixedScriptToken(token)) {
      return token
    }

    let output = ""
    for (const char of token) {
      const mapped = CONFUSABLES[char]
      if (mapped) {
        replacedCount += 1
        output += mapped
      } else {
        output += char
      }
    }
    return output
  })

  return { text, replacedCount }
}

function isWordOrLeetSymbol(char: string | undefined): boolean {
  if (char === undefined) {
    return false
  }

  return WORD_CHAR_RE.test(char) || LEET_SYMBOLS[char] !== undefined
}

function foldLeetspeak(input: string): string {
  const chars = [...input]
  let output = ""

  for (let index = 0; index < chars.length; index += 1) {
    const char = chars[index] ?? ""
    const digit = LEET_DIGITS[char]
    if (digit) {
      output += digit
      continue
    }

    const symbol = LEET_SYMBOLS[char]
    if (symbol && isWordOrLeetSymbol(chars[index + 1])) {
      output += symbol
      continue
    }

    output += char
  }

  return output
}

export function normalizeForMatching(input: string): NormalizationResult {
  const transformations: string[] = []
  const signalFlags: string[] = []

  let text = input

  const nfkc = text.normalize("NFKC")
  if (nfkc !== text) {
    transformations.push("unicode_nfkc")
    text = nfkc
  }

  const withoutControls = text.replace(CONTROL_OR_INVISIBLE_RE, "")
  if (withoutControls !== text) {
    signalFlags.push("unicode_invisible_or_bidi")
    transformations.push("strip_invisible_controls")
    text = withoutControls
  }

  const decodedEntities = decodeHtmlEntities(text)
  if (decodedEntities !== text) {
    transformations.push("decode_html_entities")
    text = decodedEntities.normalize("NFKC")
  }

  const confusableResult = mapMixedScriptConfusables(text)
  if (confusableResult.replacedCount > 0) {
    signalFlags.push("confusable_mixed_script")
    transformations.push("map_confusables")
    text = confusableResult.text
  }

  const lower = text.toLowerCase()
  if (lower !== text) {
    transformations.push("lowercase")
    text = lower
  }

  const folded = foldLeetspeak(text)
  if (folded !== text) {
    transformations.push("fold_leetspeak")
    text = folded
  }

  const collapsed = text.replace(NON_WORD_RE, " ").trim()
  if (collapsed !== text) {
    transformations.push("collapse_punctuation")
    text = collapsed
  }

  return {
    normalizedText: text,
    transformations,
    signalFlags,
  }
}

export function normalize(input: string): string {
  return normalizeForMatching(input).normalizedText
}
