/**
 * Servo driver edge and the two built-in drivers.
 */

export type ServoDriver = {
  describe: string
  setAngle: (degrees: number) => void | Promise<void>
  release?: () => void | Promise<void>
}

export type MemoryServoDriver = ServoDriver & {
  /** Most recent writes, oldest first, at most `historySize` of them */
  writes: Array<number>
  getWriteCount: () => number
  getLastAngle: () => number | null
  isReleased: () => boolean
}

export type MemoryServoOptions = {
  historySize?: number
}

/**
 * Headless driver; used by default and in tests. Memory stays bounded by
 * `historySize` however long the session runs.
 */
export const createMemoryServoDriver = ({
  historySize = 64,
}: MemoryServoOptions = {}): MemoryServoDriver => {
  if (!Number.isInteger(historySize) || historySize < 1) {
    throw new Error(`historySize must be a positive integer, got ${historySize}`)
  }

  const writes: Array<number> = []
  let writeCount = 0
  let lastAngle: number | null = null
  let released = false

  return {
    describe: 'memory servo',
    setAngle: (degrees: number) => {
      writes.push(degrees)
      if (writes.length > historySize) writes.shift()
      writeCount += 1
      lastAngle = degrees
    },
    release: () => {
      released = true
    },
    writes,
    getWriteCount: () => writeCount,
    getLastAngle: () => lastAngle,
    isReleased: () => released,
  }
}

export const createConsoleServoDriver = (
  log: (line: string) => void = (line) => console.log(line),
): ServoDriver => ({
  describe: 'console servo',
  setAngle: (degrees) => {
    log(`[Servo] angle ${degrees}°`)
  },
  release: () => {
    log('[Servo] released')
  },
})
