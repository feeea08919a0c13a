import type { Inning, TeamSelect } from '@/domain/types'

export const PREGAME_INNING: Readonly<Inning> = Object.freeze({ frame: 'top', number: 0 })

export const isPregame = (inning: Inning): boolean => inning.frame === 'top' && inning.number === 0

export const isTransitional = (inning: Inning): boolean => inning.frame === 'mid' || inning.frame === 'end'

export const nextInning = (inning: Inning): Inning => {
  switch (inning.frame) {
    case 'top':
      return { frame: 'mid', number: inning.number }
    case 'mid':
      return { frame: 'bottom', number: inning.number }
    case 'bottom':
      return { frame: 'end', number: inning.number }
    case 'end':
      return { frame: 'top', number: inning.number + 1 }
  }
}

export const battingSide = (inning: Inning): TeamSelect =>
  inning.frame === 'top' || inning.frame === 'mid' ? 'away' : 'home'

export const fieldingSide = (inning: Inning): TeamSelect => (battingSide(inning) === 'away' ? 'home' : 'away')

const FRAME_WORDS = { top: 'Top', mid: 'Mid', bottom: 'Bottom', end: 'End' } as const

export const inningWord = (inning: Inning): string => FRAME_WORDS[inning.frame]
