import type { CategoryOptions } from '../categories'
import { classifyCharacter, resolveCategory } from '../categories'
import type { ClassifiedEvent } from '../types'
import type { CounterAggregator } from './counter-aggregator'
import type { InputSource } from './input-source'

// Exactly one code point outside the Unicode "Other" (control, format, ...) categories
const COUNTABLE_CHAR = /^\P{C}$/u

class InputTracker {
  aggregator: CounterAggregator
  source: InputSource
  categoryOptions: CategoryOptions
  isListening: boolean
  acceptedCount: number
  rejectedCount: number

  constructor(aggregator: CounterAggregator, source: InputSource, categoryOptions: CategoryOptions) {
    this.aggregator = aggregator
    this.source = source
    this.categoryOptions = categoryOptions
    this.isListening = false
    this.acceptedCount = 0
    this.rejectedCount = 0
  }

  start(onEnd: () => void) {
    if (this.isListening) {
      console.warn('Input tracker is already listening')
      return
    }
    this.source.start(
      (char) => this.handleChar(char),
      () => onEnd(),
    )
    this.isListening = true
  }

  /**
   * Classifies and records one character. Control characters and
   * multi-character strings are dropped before classification and yield null.
   */
  handleChar(char: string): ClassifiedEvent | null {
    if (!COUNTABLE_CHAR.test(char)) {
      this.rejectedCount++
      return null
    }
    const event: ClassifiedEvent = {
      category: resolveCategory(classifyCharacter(char), this.categoryOptions),
      timestamp: this.aggregator.clock(),
    }
    this.aggregator.record(event.category, event.timestamp)
    this.acceptedCount++
    return event
  }

  stop() {
    if (!this.isListening) return
    this.source.stop()
    this.isListening = false
  }
}

export { InputTracker }
