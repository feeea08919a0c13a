import { basesBehind, basesOccupied, createGame, describeBase, isFinished } from '@/domain/game'
import { testId } from '@/test/simFactory'

describe('createGame', () => {
  it('starts in the pregame with an empty scoreboard', () => {
    const game = createGame({ away: testId(10), home: testId(20) }, testId(30))

    expect(game).toEqual({
      id: testId(30),
      winner: null,
      lastUpdate: '',
      teams: {
        away: { id: testId(10), runs: 0, runsByInning: [], pitcher: null, lineupSlot: 0 },
        home: { id: testId(20), runs: 0, runsByInning: [], pitcher: null, lineupSlot: 0 },
      },
      inning: { frame: 'top', number: 0 },
      atBat: null,
      balls: 0,
      strikes: 0,
      outs: 0,
      baserunners: [],
    })
    expect(isFinished(game)).toBe(false)
  })

  it('collects occupied bases', () => {
    const game = createGame({ away: testId(10), home: testId(20) })
    game.baserunners = [
      { playerId: testId(1), base: 3 },
      { playerId: testId(2), base: 1 },
    ]

    expect([...basesOccupied(game)].sort()).toEqual([1, 3])
  })

  it('lists the bases behind a runner', () => {
    expect(basesBehind(3)).toEqual([1, 2])
    expect(basesBehind(1)).toEqual([])
  })
})

describe('describeBase', () => {
  it('names the standard bases and home', () => {
    expect([1, 2, 3, 4].map((base) => describeBase(base))).toEqual([
      'first base',
      'second base',
      'third base',
      'home',
    ])
  })

  it('falls back to ordinals when home is further out', () => {
    expect(describeBase(4, 6)).toBe('fourth base')
    expect(describeBase(5, 6)).toBe('5th base')
    expect(describeBase(6, 6)).toBe('home')
    expect(describeBase(12, 13)).toBe('12th base')
    expect(describeBase(22, 23)).toBe('22nd base')
  })
})
