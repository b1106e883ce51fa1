import type { Readable } from 'node:stream'

/**
 * Delivers typed characters to the tracker. OS-level keyboard hooks plug in
 * behind this interface; the terminal implementation below is the one that
 * ships.
 */
interface InputSource {
  start(onChar: (char: string) => void, onEnd: () => void): void
  stop(): void
}

type InputStream = Readable & {
  isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
}

// Ctrl+C and Ctrl+D end the session when the terminal is in raw mode
const END_OF_INPUT = new Set(['\u0003', '\u0004'])

/**
 * Reads characters from a terminal in raw mode (one event per keystroke,
 * including IME-composed Chinese text) or from piped text.
 */
class TerminalInputSource implements InputSource {
  stream: InputStream
  _onData: ((chunk: string) => void) | null
  _onEnd: (() => void) | null

  constructor(stream: InputStream = process.stdin) {
    this.stream = stream
    this._onData = null
    this._onEnd = null
  }

  start(onChar: (char: string) => void, onEnd: () => void) {
    if (this._onData) return

    this._onData = (chunk: string) => {
      for (const char of chunk) {
        if (END_OF_INPUT.has(char)) {
          onEnd()
          return
        }
        onChar(char)
      }
    }
    this._onEnd = onEnd

    if (this.stream.isTTY && this.stream.setRawMode) this.stream.setRawMode(true)
    this.stream.setEncoding('utf8')
    this.stream.on('data', this._onData)
    this.stream.on('end', this._onEnd)
    this.stream.resume()
  }

  stop() {
    if (this._onData) this.stream.removeListener('data', this._onData)
    if (this._onEnd) this.stream.removeListener('end', this._onEnd)
    this._onData = null
    this._onEnd = null
    if (this.stream.isTTY && this.stream.setRawMode) this.stream.setRawMode(false)
    this.stream.pause()
  }
}

export { TerminalInputSource }
export type { InputSource, InputStream }
