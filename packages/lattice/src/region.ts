import type {
  Atom,
  AtomSet,
  LatticeAxis,
  Vector3,
} from '@lattice-view/shared/types'

import { invalidParameter } from './errors'
import { createLogger } from './logger'
import { freezeAtoms } from './unit-cell'
import { add, cross, isFiniteVector, norm, scale, sub } from './vector'

const logger = createLogger('lattice:region')

export type PositionPredicate = (position: Vector3) => boolean

export type Cylinder = {
  /** Any point on the cylinder axis. */
  origin: Vector3
  direction: Vector3
  radius: number
}

export type CarveCylinderOptions = {
  axis: LatticeAxis
  radius: number
  /** Defaults to the midpoint of the two cell vectors orthogonal to `axis`. */
  center?: Vector3
}

const OTHER_AXES: Record<LatticeAxis, [LatticeAxis, LatticeAxis]> = {
  a: ['b', 'c'],
  b: ['a', 'c'],
  c: ['a', 'b'],
}

/** 原子順を保ったまま述語を満たす原子だけを残す。セルは変更しない。 */
export const filterAtomSet = (
  set: AtomSet,
  predicate: PositionPredicate,
): AtomSet => {
  const kept: Array<Atom> = set.atoms.filter((atom) =>
    predicate({ x: atom.x, y: atom.y, z: atom.z }),
  )
  return Object.freeze({ atoms: freezeAtoms(kept), cell: set.cell })
}

/**
 * Slack, relative to an atom's distance from the axis origin, under which the
 * atom counts as lying on the cylinder surface (or on the axis for R = 0).
 */
export const ON_AXIS_TOLERANCE = 1e-12

const requireAxisDirection = (direction: Vector3) => {
  if (!isFiniteVector(direction) || norm(direction) === 0) {
    throw invalidParameter('Axis direction must be a finite non-zero vector', {
      direction,
    })
  }
}

const distanceToAxis = (offset: Vector3, direction: Vector3) =>
  norm(cross(offset, direction)) / norm(direction)

/** 点から軸 (origin を通り direction に平行な直線) までの距離。 */
export const perpendicularDistance = (
  point: Vector3,
  origin: Vector3,
  direction: Vector3,
): number => {
  requireAxisDirection(direction)
  return distanceToAxis(sub(point, origin), direction)
}

export const cylinderPredicate = ({
  origin,
  direction,
  radius,
}: Cylinder): PositionPredicate => {
  if (!Number.isFinite(radius) || radius < 0) {
    throw invalidParameter('radius must be a finite number >= 0', { radius })
  }
  requireAxisDirection(direction)
  if (!isFiniteVector(origin)) {
    throw invalidParameter('Cylinder origin must be finite')
  }
  return (position) => {
    const offset = sub(position, origin)
    return (
      distanceToAxis(offset, direction) <=
      radius + ON_AXIS_TOLERANCE * norm(offset)
    )
  }
}

export const defaultCarveCenter = (set: AtomSet, axis: LatticeAxis): Vector3 => {
  const [first, second] = OTHER_AXES[axis]
  return scale(add(set.cell[first], set.cell[second]), 0.5)
}

/**
 * Keeps the atoms inside a cylinder whose axis runs parallel to one of the
 * cell vectors. Containment is inclusive: an atom exactly `radius` away stays.
 */
export const carveCylinder = (
  set: AtomSet,
  { axis, radius, center }: CarveCylinderOptions,
): AtomSet => {
  const origin = center ?? defaultCarveCenter(set, axis)
  const carved = filterAtomSet(
    set,
    cylinderPredicate({ origin, direction: set.cell[axis], radius }),
  )
  logger.debug('carved cylinder', {
    axis,
    radius,
    before: set.atoms.length,
    after: carved.atoms.length,
  })
  return carved
}
