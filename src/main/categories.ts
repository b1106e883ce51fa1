import type { Category, CategoryCounts, CharacterInfo } from './types'

const CATEGORIES: readonly Category[] = ['chinese', 'english', 'number', 'symbol', 'other']

// CJK Unified Ideographs
const CHINESE_RANGE = { start: 0x4e00, end: 0x9fff }

const SYMBOL_CHARS = new Set([
  // ASCII punctuation
  ...'!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~',
  // Full-width and CJK punctuation produced by Chinese input methods
  ...'，。！？；：、“”‘’（）《》〈〉【】「」『』…—·～￥',
])

interface CategoryOptions {
  countNumbers: boolean
  countSymbols: boolean
}

function emptyCounts(): CategoryCounts {
  return { chinese: 0, english: 0, number: 0, symbol: 0, other: 0, total: 0 }
}

/**
 * Classifies one character. Ranges are checked in a fixed order
 * (Chinese, English, Number, Symbol) and the first match wins; anything
 * else, including whitespace, control characters and multi-character
 * strings, is 'other'.
 */
function classifyCharacter(char: string): Category {
  const codePoint = char.codePointAt(0)
  if (codePoint === undefined || [...char].length !== 1) return 'other'

  if (codePoint >= CHINESE_RANGE.start && codePoint <= CHINESE_RANGE.end) return 'chinese'
  if ((codePoint >= 0x41 && codePoint <= 0x5a) || (codePoint >= 0x61 && codePoint <= 0x7a)) return 'english'
  if (codePoint >= 0x30 && codePoint <= 0x39) return 'number'
  if (SYMBOL_CHARS.has(char)) return 'symbol'
  return 'other'
}

/**
 * Folds categories the user chose not to track into 'other'.
 */
function resolveCategory(category: Category, options: CategoryOptions): Category {
  if (category === 'number' && !options.countNumbers) return 'other'
  if (category === 'symbol' && !options.countSymbols) return 'other'
  return category
}

function analyzeText(text: string): CategoryCounts {
  const counts = emptyCounts()
  for (const char of text) {
    counts[classifyCharacter(char)]++
    counts.total++
  }
  return counts
}

function describeCharacter(char: string): CharacterInfo {
  const codePoint = char.codePointAt(0) ?? null
  return {
    char,
    category: classifyCharacter(char),
    codePoint,
    hex: codePoint === null ? null : `U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`,
  }
}

function addCounts(target: CategoryCounts, delta: CategoryCounts) {
  for (const category of CATEGORIES) {
    target[category] += delta[category]
  }
  target.total += delta.total
}

function subtractCounts(target: CategoryCounts, delta: CategoryCounts) {
  for (const category of CATEGORIES) {
    target[category] -= delta[category]
  }
  target.total -= delta.total
}

function isZero(counts: CategoryCounts): boolean {
  return counts.total === 0 && CATEGORIES.every((category) => counts[category] === 0)
}

export {
  addCounts,
  analyzeText,
  CATEGORIES,
  classifyCharacter,
  describeCharacter,
  emptyCounts,
  isZero,
  resolveCategory,
  subtractCounts,
}
export type { CategoryOptions }
