import type { AtomSet, RepeatCounts, UnitCell } from '@lattice-view/shared/types'

import { emptyResult, invalidParameter, requireFinitePositive } from './errors'
import { carveCylinder } from './region'
import { replicate } from './replicate'
import { norm } from './vector'

export type WireParams = {
  cell: UnitCell
  /** Wire length along the c vector, in the cell's length unit. */
  length: number
  diameter: number
}

export type Wire = {
  readonly atomSet: AtomSet
  readonly repeats: Readonly<RepeatCounts>
  readonly radius: number
}

export const wireRepeatCounts = (
  cell: UnitCell,
  length: number,
  diameter: number,
): RepeatCounts => {
  requireFinitePositive('length', length)
  requireFinitePositive('diameter', diameter)
  const { a, b, c } = cell.lattice
  const repeats: RepeatCounts = [
    Math.floor(diameter / norm(a)),
    Math.floor(diameter / norm(b)),
    Math.floor(length / norm(c)),
  ]
  if (repeats.some((count) => count < 1)) {
    throw invalidParameter('Wire is smaller than a single unit cell', {
      length,
      diameter,
      repeats,
    })
  }
  return repeats
}

/** バルク格子を切り出して円柱状のワイヤーを作る。 */
export const buildWire = ({ cell, length, diameter }: WireParams): Wire => {
  const repeats = wireRepeatCounts(cell, length, diameter)
  const radius = diameter / 2
  const atomSet = carveCylinder(replicate(cell, repeats), { axis: 'c', radius })
  if (atomSet.atoms.length === 0) {
    throw emptyResult('Cylinder carve removed every atom', { radius, repeats })
  }
  return Object.freeze({ atomSet, repeats: Object.freeze(repeats), radius })
}
