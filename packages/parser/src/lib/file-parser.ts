import * as fs from 'node:fs'
import { Parser } from './parser'
import { FileParserOptions, ParserOptions } from './parser-options'
import { ParserError } from './parser-error'
import { JsonValue } from './json-value'

export class FileParser extends Parser {
  readonly bufferSize: number
  #filePath: fs.PathLike

  constructor(filePath: fs.PathLike, options: Partial<FileParserOptions> = {}) {
    super(withoutBufferSize(options))

    this.#filePath = filePath
    this.bufferSize = options.bufferSize ?? 8 * 1024
    if (!Number.isFinite(this.bufferSize)) {
      this.bufferSize = 8 * 1024
    } else if (this.bufferSize < 8) {
      this.bufferSize = 8
    } else if (this.bufferSize % 8 !== 0) {
      this.bufferSize = (Math.floor(this.bufferSize / 8) + 1) * 8
    }
  }

  /**
   * Reads the whole file, then parses its contents into a value tree.
   */
  override async parse(): Promise<JsonValue> {
    const chunks: Uint8Array[] = []
    let fileDescriptor: number | undefined

    try {
      fileDescriptor = await this.#openFile()
      let position = 0
      let input = await this.#readFile(fileDescriptor, position)

      while (input.bytesRead > 0) {
        this.options.logger?.debug(`Read ${input.bytesRead} bytes from ${this.#filePath}`)
        chunks.push(input.data.subarray(0, input.bytesRead))
        position += input.bytesRead
        input = await this.#readFile(fileDescriptor, position)
      }
    } finally {
      if (fileDescriptor !== undefined) {
        await this.#closeFile(fileDescriptor)
      }
    }

    return this.parseBuffer(Buffer.concat(chunks))
  }

  async #openFile(): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      fs.open(this.#filePath, 'r', (err, fd) => {
        if (err) {
          reject(new ParserError(`Unable to open file ${this.#filePath}`, err))
        } else {
          resolve(fd)
        }
      })
    })
  }

  async #readFile(fileDescriptor: number, position: number): Promise<{ data: Uint8Array; bytesRead: number }> {
    return new Promise((resolve, reject) => {
      fs.read(
        fileDescriptor,
        { buffer: new Uint8Array(this.bufferSize), length: this.bufferSize, position },
        (err, bytesRead, data) => {
          if (err) {
            reject(new ParserError(`Unable to read file ${this.#filePath}`, err))
          } else {
            resolve({ data, bytesRead })
          }
        },
      )
    })
  }

  async #closeFile(fileDescriptor: number): Promise<void> {
    return new Promise((resolve, reject) => {
      fs.close(fileDescriptor, (err) => {
        if (err) {
          reject(new ParserError(`Unable to close file ${this.#filePath}`, err))
        } else {
          resolve()
        }
      })
    })
  }
}

function withoutBufferSize(options: Partial<FileParserOptions>): Partial<ParserOptions> {
  const { bufferSize: _bufferSize, ...parserOptions } = options
  return parserOptions
}
