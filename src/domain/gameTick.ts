import type { SimConfig } from '@/domain/config'
import { insertPlayer, loadPlayer, loadTeam } from '@/domain/database'
import { SimInvariantError } from '@/domain/errors'
import { HOME_BASE, basesBehind, basesOccupied, describeBase, isFinished } from '@/domain/game'
import { generatePlayerWithName } from '@/domain/generator'
import { battingSide, fieldingSide, inningWord, isPregame, isTransitional, nextInning } from '@/domain/inning'
import {
  rollBaseHit,
  rollContact,
  rollFlyout,
  rollFoul,
  rollHomeRun,
  rollOut,
  rollStrike,
  rollSwing,
} from '@/domain/outcomes'
import type { HitBases, OutcomeContext } from '@/domain/outcomes'
import type { Prng } from '@/domain/prng'
import { teamName } from '@/domain/team'
import type { Baserunner, Database, Game, Player, PlayerId, Team, TeamSelect } from '@/domain/types'

export const BALLS_NEEDED = 4
export const STRIKES_NEEDED = 3
export const OUTS_NEEDED = 3
export const FINAL_INNING = 9

const HIT_NAMES: Record<HitBases, string> = {
  1: 'Single',
  2: 'Double',
  3: 'Triple',
}

interface TickContext {
  prng: Prng
  database: Database
  config: SimConfig
  outcomes: OutcomeContext
}

export type OrderRoster = 'lineup' | 'rotation'

export interface OrderResolution {
  kind: 'current' | 'new'
  playerId: PlayerId
  cursor: number
}

/**
 * Picks who bats or pitches next. An occupied slot is reused as is; otherwise
 * the roster entry at the cursor (or the first entry once the cursor runs off
 * the end) takes it, and an empty roster gets a generated stand-in.
 */
export const resolveNextInOrder = (
  context: Pick<TickContext, 'prng' | 'database' | 'config'>,
  team: Team,
  roster: OrderRoster,
  current: PlayerId | null,
  cursor: number,
  placeholderName: string,
): OrderResolution => {
  if (current !== null) {
    return { kind: 'current', playerId: current, cursor }
  }

  const order = team[roster]
  let playerId: PlayerId
  if (order.length > 0) {
    playerId = cursor >= 0 && cursor < order.length ? order[cursor] : order[0]
  } else {
    const placeholder = generatePlayerWithName(context.prng, placeholderName, context.database.rituals)
    insertPlayer(context.database, placeholder)
    order.push(placeholder.id)
    playerId = placeholder.id
    context.config.logger.info('[sim] generated placeholder', placeholderName, 'for', teamName(team))
  }

  return { kind: 'new', playerId, cursor: order.indexOf(playerId) }
}

const battingTeam = (game: Game) => game.teams[battingSide(game.inning)]

const addRuns = (game: Game, runs: number) => {
  const side = battingTeam(game)
  side.runs += runs
  const index = game.inning.number - 1
  while (side.runsByInning.length <= index) {
    side.runsByInning.push(0)
  }
  side.runsByInning[index] += runs
}

const endPlateAppearance = (game: Game) => {
  game.balls = 0
  game.strikes = 0
  game.atBat = null
  battingTeam(game).lineupSlot += 1
}

export const registerOut = (game: Game): void => {
  game.outs += 1
  if (game.outs < OUTS_NEEDED) {
    return
  }

  game.balls = 0
  game.strikes = 0
  game.outs = 0
  if (game.atBat !== null) {
    game.atBat = null
    battingTeam(game).lineupSlot += 1
  }
  game.baserunners = []
  game.inning = nextInning(game.inning)
}

const rollFielder = (game: Game, context: TickContext): Player => {
  const team = loadTeam(context.database, game.teams[fieldingSide(game.inning)].id)
  const fielderId = context.prng.choose(team.lineup)
  if (fielderId === undefined) {
    throw new SimInvariantError(`Team ${team.id} has no one to field`, { teamId: team.id })
  }
  return loadPlayer(context.database, fielderId)
}

const resolveGameOver = (game: Game, context: TickContext): string | null => {
  const { away, home } = game.teams
  const late = game.inning.number >= FINAL_INNING
  let winner: TeamSelect | null = null
  if (late && isTransitional(game.inning) && away.runs < home.runs) {
    winner = 'home'
  } else if (late && game.inning.frame === 'end' && away.runs > home.runs) {
    winner = 'away'
  }
  if (winner === null) {
    return null
  }

  game.winner = game.teams[winner].id
  const awayTeam = loadTeam(context.database, away.id)
  const homeTeam = loadTeam(context.database, home.id)
  awayTeam.rotationSlot += 1
  homeTeam.rotationSlot += 1
  return `Game over. ${awayTeam.nickname} ${away.runs}, ${homeTeam.nickname} ${home.runs}`
}

const resolveInningBreak = (game: Game, context: TickContext): string | null => {
  if (isPregame(game.inning)) {
    game.inning = { frame: 'top', number: 1 }
    return 'Play ball!'
  }
  if (!isTransitional(game.inning)) {
    return null
  }

  game.inning = nextInning(game.inning)
  const team = loadTeam(context.database, battingTeam(game).id)
  return `${inningWord(game.inning)} of ${game.inning.number}, ${teamName(team)} batting.`
}

const handleSteal = (game: Game, context: TickContext): string | null => {
  // Draws a would-be catcher; nothing reads it yet but the draw is part of the sequence.
  rollFielder(game, context)

  const { attemptThreshold, successThreshold } = context.config.steal
  const occupied = basesOccupied(game)
  for (let index = 0; index < game.baserunners.length; index += 1) {
    const runner = game.baserunners[index]
    const target = runner.base + 1
    if (occupied.has(target)) {
      continue
    }
    if (!(context.prng.next() < attemptThreshold)) {
      continue
    }

    const name = loadPlayer(context.database, runner.playerId).name
    if (context.prng.next() < successThreshold) {
      if (target >= HOME_BASE) {
        game.baserunners.splice(index, 1)
        addRuns(game, 1)
      } else {
        runner.base = target
      }
      return `${name} steals ${describeBase(target)}!`
    }

    game.baserunners.splice(index, 1)
    registerOut(game)
    return `${name} gets caught stealing ${describeBase(target)}.`
  }

  return null
}

const handleStrike = (game: Game, batter: Player, kind: 'looking' | 'swinging'): string => {
  game.strikes += 1
  if (game.strikes < STRIKES_NEEDED) {
    return `Strike, ${kind}. ${game.balls}-${game.strikes}`
  }

  endPlateAppearance(game)
  registerOut(game)
  return `${batter.name} strikes out ${kind}.`
}

const handleBall = (game: Game, batter: Player, context: TickContext): string => {
  game.balls += 1
  if (game.balls < BALLS_NEEDED) {
    return `Ball. ${game.balls}-${game.strikes}`
  }

  let message = `${batter.name} draws a walk.`
  const occupied = basesOccupied(game)
  const remaining: Baserunner[] = []
  for (const runner of game.baserunners) {
    // Only runners with every base behind them filled are forced.
    const forced = basesBehind(runner.base).every((behind) => occupied.has(behind))
    const base = forced ? runner.base + 1 : runner.base
    if (base >= HOME_BASE) {
      addRuns(game, 1)
      message += ` ${loadPlayer(context.database, runner.playerId).name} scores!`
    } else {
      remaining.push({ playerId: runner.playerId, base })
    }
  }
  remaining.push({ playerId: batter.id, base: 1 })
  game.baserunners = remaining
  endPlateAppearance(game)
  return message
}

const handleHomeRun = (game: Game, batter: Player): string => {
  const runs = game.baserunners.length + 1
  game.baserunners = []
  addRuns(game, runs)
  endPlateAppearance(game)
  return runs === 1 ? `${batter.name} hits a solo home run!` : `${batter.name} hits a ${runs}-run home run!`
}

const handleBaseHit = (game: Game, batter: Player, bases: HitBases, context: TickContext): string => {
  let message = `${batter.name} hits a ${HIT_NAMES[bases]}!`
  const remaining: Baserunner[] = []
  // TODO: extra-base advancement once runner speed feeds into it.
  for (const runner of game.baserunners) {
    const base = runner.base + bases
    if (base >= HOME_BASE) {
      addRuns(game, 1)
      message += ` ${loadPlayer(context.database, runner.playerId).name} scores!`
    } else {
      remaining.push({ playerId: runner.playerId, base })
    }
  }
  remaining.push({ playerId: batter.id, base: bases })
  game.baserunners = remaining
  endPlateAppearance(game)
  return message
}

const playPitch = (game: Game, context: TickContext): string => {
  const fieldingGameTeam = game.teams[fieldingSide(game.inning)]
  const fieldingTeam = loadTeam(context.database, fieldingGameTeam.id)
  const pitcherSlot = resolveNextInOrder(
    context,
    fieldingTeam,
    'rotation',
    fieldingGameTeam.pitcher,
    fieldingTeam.rotationSlot,
    'Pitching Machine',
  )
  fieldingGameTeam.pitcher = pitcherSlot.playerId
  fieldingTeam.rotationSlot = pitcherSlot.cursor

  const battingGameTeam = battingTeam(game)
  const battingRoster = loadTeam(context.database, battingGameTeam.id)
  const batterSlot = resolveNextInOrder(
    context,
    battingRoster,
    'lineup',
    game.atBat,
    battingGameTeam.lineupSlot,
    'Batting Machine',
  )
  game.atBat = batterSlot.playerId
  battingGameTeam.lineupSlot = batterSlot.cursor

  const pitcher = loadPlayer(context.database, pitcherSlot.playerId)
  const batter = loadPlayer(context.database, batterSlot.playerId)
  if (batterSlot.kind === 'new') {
    return `${batter.name} batting for the ${battingRoster.nickname}.`
  }

  const steal = handleSteal(game, context)
  if (steal !== null) {
    return steal
  }

  const { outcomes, prng } = context
  const strike = rollStrike(prng, outcomes, pitcher, batter)
  if (!rollSwing(prng, outcomes, pitcher, batter, strike)) {
    return strike ? handleStrike(game, batter, 'looking') : handleBall(game, batter, context)
  }
  if (!rollContact(prng, outcomes, pitcher, batter, strike)) {
    return handleStrike(game, batter, 'swinging')
  }
  if (rollFoul(prng, outcomes, batter)) {
    game.strikes = Math.min(STRIKES_NEEDED - 1, game.strikes + 1)
    return `Foul Ball. ${game.balls}-${game.strikes}`
  }

  const fielder = rollFielder(game, context)
  if (rollOut(prng, outcomes, pitcher, fielder, batter)) {
    // TODO: double plays and fielder's choice.
    const kind = rollFlyout(prng, outcomes, batter) ? 'flyout' : 'ground out'
    endPlateAppearance(game)
    registerOut(game)
    return `${batter.name} hit a ${kind} to ${fielder.name}.`
  }
  if (rollHomeRun(prng, outcomes, pitcher, batter)) {
    return handleHomeRun(game, batter)
  }

  const defender = rollFielder(game, context)
  return handleBaseHit(game, batter, rollBaseHit(prng, outcomes, pitcher, defender, batter), context)
}

/**
 * Resolves exactly one event for `game` and returns its play-by-play line. The
 * caller owns the game exclusively for the duration of the call.
 */
export const tickGame = (game: Game, prng: Prng, database: Database, config: SimConfig): string => {
  if (isFinished(game)) {
    throw new SimInvariantError(`Game ${game.id} is already finished`, { gameId: game.id })
  }

  const context: TickContext = {
    prng,
    database,
    config,
    outcomes: { date: database.date, ballpark: config.ballpark },
  }

  return resolveGameOver(game, context) ?? resolveInningBreak(game, context) ?? playPitch(game, context)
}
