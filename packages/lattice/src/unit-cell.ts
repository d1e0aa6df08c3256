import type {
  Atom,
  CellParameters,
  Lattice,
  UnitCell,
  Vector3,
} from '@lattice-view/shared/types'

import { degenerateGeometry, invalidParameter } from './errors'
import { add, angleBetween, cross, dot, isFiniteVector, norm, scale } from './vector'

/** 体積判定の相対許容誤差 (|a||b||c| に対する比)。 */
export const VOLUME_TOLERANCE = 1.0e-10

export const cellVolume = (lattice: Lattice) =>
  dot(lattice.a, cross(lattice.b, lattice.c))

export const fractionalToCartesian = (
  fraction: Vector3,
  lattice: Lattice,
): Vector3 =>
  add(
    add(scale(lattice.a, fraction.x), scale(lattice.b, fraction.y)),
    scale(lattice.c, fraction.z),
  )

export const cellParameters = (lattice: Lattice): CellParameters => ({
  a: norm(lattice.a),
  b: norm(lattice.b),
  c: norm(lattice.c),
  alpha: angleBetween(lattice.b, lattice.c),
  beta: angleBetween(lattice.a, lattice.c),
  gamma: angleBetween(lattice.a, lattice.b),
})

export const freezeAtoms = (atoms: Iterable<Atom>): ReadonlyArray<Atom> =>
  Object.freeze(Array.from(atoms, (atom) => Object.freeze({ ...atom })))

export const freezeLattice = (lattice: Lattice): Lattice =>
  Object.freeze({
    a: Object.freeze({ ...lattice.a }),
    b: Object.freeze({ ...lattice.b }),
    c: Object.freeze({ ...lattice.c }),
  })

export const assertNonDegenerate = (lattice: Lattice): void => {
  const volume = cellVolume(lattice)
  const scaleFactor = norm(lattice.a) * norm(lattice.b) * norm(lattice.c)
  if (!(Math.abs(volume) > VOLUME_TOLERANCE * scaleFactor)) {
    throw degenerateGeometry('Lattice vectors are coplanar (zero cell volume)', {
      volume,
    })
  }
}

export const createUnitCell = (
  lattice: Lattice,
  atoms: ReadonlyArray<Atom>,
): UnitCell => {
  for (const axis of ['a', 'b', 'c'] as const) {
    if (!isFiniteVector(lattice[axis])) {
      throw invalidParameter(`Lattice vector ${axis} has non-finite components`, {
        axis,
      })
    }
  }
  if (atoms.length === 0) {
    throw invalidParameter('A unit cell needs at least one atom')
  }
  atoms.forEach((atom, index) => {
    if (!atom.symbol || !isFiniteVector(atom)) {
      throw invalidParameter('Atom has an empty symbol or non-finite position', {
        index,
      })
    }
  })
  assertNonDegenerate(lattice)

  return Object.freeze({
    lattice: freezeLattice(lattice),
    atoms: freezeAtoms(atoms),
  })
}
