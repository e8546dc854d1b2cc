export type Milliseconds = number
export type Seconds = number

export function secondsToMs(seconds: Seconds): Milliseconds {
  return seconds * 1000
}
