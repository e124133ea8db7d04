import { RandomSource } from '../src/dice/rng'

/**
 * Random source that makes `rollD6` return the given faces in order.
 */
export function scripted(faces: number[]): RandomSource {
  const queue = [...faces]
  return () => {
    const face = queue.shift()
    if (face === undefined) throw new Error('scripted random source exhausted')
    return (face - 0.5) / 6
  }
}
