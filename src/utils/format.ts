const pad = (num: number) => num.toString().padStart(2, '0')

// s/km → "m:ss/km"
export const formatPace = (secondsPerKm: number): string => {
  const m = Math.floor(secondsPerKm / 60)
  const s = Math.floor(secondsPerKm % 60)
  return `${m}:${pad(s)}/km`
}

export const msToKmh = (speed: number): number => speed * 3.6
