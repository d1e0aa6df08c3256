import type { RepeatCounts } from '@lattice-view/shared/types'
import type { ViewAngles } from '@lattice-view/shared/view-state'

import { invalidParameter, requireFinitePositive, requirePositiveInteger } from './errors'

/** 比較表示する 2 相で必ず共有する描画・生成パラメータ。 */
export type SharedParams = {
  repetitionsB2: RepeatCounts
  repetitionsB19: RepeatCounts
  bondDistance: number
  atomSize: number
  bondWidth: number
  bondAlpha: number
  initialView: ViewAngles
}

export type SharedParamsOverrides = Partial<SharedParams>

const DEFAULTS: SharedParams = {
  repetitionsB2: [2, 2, 4],
  repetitionsB19: [2, 2, 2],
  bondDistance: 3.2,
  atomSize: 300,
  bondWidth: 1.5,
  bondAlpha: 0.4,
  initialView: { elev: 20, azim: 45 },
}

Object.freeze(DEFAULTS.repetitionsB2)
Object.freeze(DEFAULTS.repetitionsB19)
Object.freeze(DEFAULTS.initialView)

export const DEFAULT_SHARED_PARAMS: Readonly<SharedParams> = Object.freeze(DEFAULTS)

export const validateRepeatCounts = (
  name: string,
  counts: ReadonlyArray<number>,
): RepeatCounts => {
  if (counts.length !== 3) {
    throw invalidParameter(`${name} must have exactly three entries`, {
      [name]: [...counts],
    })
  }
  const [na, nb, nc] = counts
  return [
    requirePositiveInteger(`${name}[0]`, na),
    requirePositiveInteger(`${name}[1]`, nb),
    requirePositiveInteger(`${name}[2]`, nc),
  ]
}

const requireFinite = (name: string, value: number): number => {
  if (!Number.isFinite(value)) {
    throw invalidParameter(`${name} must be a finite number`, { [name]: value })
  }
  return value
}

export const createSharedParams = (
  overrides: SharedParamsOverrides = {},
): Readonly<SharedParams> => {
  const merged = { ...DEFAULT_SHARED_PARAMS, ...overrides }
  if (!(merged.bondAlpha >= 0 && merged.bondAlpha <= 1)) {
    throw invalidParameter('bondAlpha must be within [0, 1]', {
      bondAlpha: merged.bondAlpha,
    })
  }
  const params: SharedParams = {
    repetitionsB2: validateRepeatCounts('repetitionsB2', merged.repetitionsB2),
    repetitionsB19: validateRepeatCounts('repetitionsB19', merged.repetitionsB19),
    bondDistance: requireFinitePositive('bondDistance', merged.bondDistance),
    atomSize: requireFinitePositive('atomSize', merged.atomSize),
    bondWidth: requireFinitePositive('bondWidth', merged.bondWidth),
    bondAlpha: merged.bondAlpha,
    initialView: Object.freeze({
      elev: requireFinite('initialView.elev', merged.initialView.elev),
      azim: requireFinite('initialView.azim', merged.initialView.azim),
    }),
  }
  Object.freeze(params.repetitionsB2)
  Object.freeze(params.repetitionsB19)
  return Object.freeze(params)
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type RuntimeConfig = {
  debug: boolean
  logLevel: LogLevel
}

type EnvRecord = Record<string, string | undefined>

const TRUTHY_FLAGS = new Set(['1', 'true', 'yes', 'on'])

const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as ReadonlyArray<string>).includes(value)

const normalizeLogLevel = (value: string | undefined, debug: boolean): LogLevel => {
  const trimmed = value?.trim().toLowerCase() ?? ''
  if (isLogLevel(trimmed)) {
    return trimmed
  }
  return debug ? 'debug' : 'warn'
}

/** 環境変数からログ設定を解決する。未設定・不正値は既定値に倒す。 */
export const resolveRuntimeConfig = (env: EnvRecord = process.env): RuntimeConfig => {
  const flag = env.LATTICE_VIEW_DEBUG?.trim().toLowerCase() ?? ''
  const debug = TRUTHY_FLAGS.has(flag)
  return {
    debug,
    logLevel: normalizeLogLevel(env.LATTICE_VIEW_LOG_LEVEL, debug),
  }
}
