import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'kiln-test-'))
}

/** A writable stream stand-in that keeps what was written. */
export function memoryStream(): {stream: {write(chunk: string): boolean}; output: () => string} {
  const chunks: string[] = []
  return {
    stream: {
      write(chunk: string) {
        chunks.push(chunk)
        return true
      }
    },
    output: () => chunks.join('')
  }
}
