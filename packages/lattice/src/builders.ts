import type { Atom, Lattice, UnitCell } from '@lattice-view/shared/types'

import { invalidParameter, requireFinitePositive } from './errors'
import { createUnitCell, fractionalToCartesian } from './unit-cell'
import { vec } from './vector'

export type SpeciesPair = readonly [string, string]

export type B2Params = {
  a: number
  species: SpeciesPair
}

export type B19Params = {
  a: number
  b: number
  c: number
  /** Monoclinic angle between the a and c axes, in degrees. */
  beta: number
  species: SpeciesPair
}

export const NITINOL_B2: Readonly<B2Params> = Object.freeze({
  a: 3.015,
  species: ['Ti', 'Ni'] as const,
})

export const NITINOL_B19: Readonly<B19Params> = Object.freeze({
  a: 2.89,
  b: 4.12,
  c: 4.62,
  beta: 96.8,
  species: ['Ti', 'Ni'] as const,
})

const requireSpecies = (species: SpeciesPair): SpeciesPair => {
  if (species.length !== 2 || species.some((symbol) => !symbol.trim())) {
    throw invalidParameter('species must be two non-empty tags', {
      species: [...species],
    })
  }
  return species
}

/** CsCl 型 (B2) 立方晶: 頂点と体心に 1 原子ずつ。 */
export const buildB2Cell = ({ a, species }: B2Params): UnitCell => {
  requireFinitePositive('a', a)
  const [corner, center] = requireSpecies(species)
  const lattice: Lattice = {
    a: vec(a, 0, 0),
    b: vec(0, a, 0),
    c: vec(0, 0, a),
  }
  const atoms: Array<Atom> = [
    { symbol: corner, ...fractionalToCartesian(vec(0, 0, 0), lattice) },
    { symbol: center, ...fractionalToCartesian(vec(0.5, 0.5, 0.5), lattice) },
  ]
  return createUnitCell(lattice, atoms)
}

/**
 * Monoclinic B19' cell holding two formula units.
 *
 * The four sites are an approximate layout written directly in Cartesian
 * coordinates, not positions derived from the B19' space group.
 */
export const buildB19Cell = ({ a, b, c, beta, species }: B19Params): UnitCell => {
  requireFinitePositive('a', a)
  requireFinitePositive('b', b)
  requireFinitePositive('c', c)
  if (!Number.isFinite(beta) || beta <= 0 || beta >= 180) {
    throw invalidParameter('beta must be within (0, 180) degrees', { beta })
  }
  const [first, second] = requireSpecies(species)
  const radians = (beta * Math.PI) / 180
  const lattice: Lattice = {
    a: vec(a, 0, 0),
    b: vec(0, b, 0),
    c: vec(c * Math.cos(radians), 0, c * Math.sin(radians)),
  }
  const atoms: Array<Atom> = [
    { symbol: first, x: 0, y: 0, z: 0 },
    { symbol: second, x: a / 2, y: b / 2, z: c / 2 },
    { symbol: first, x: a / 2, y: 0, z: c / 2 },
    { symbol: second, x: 0, y: b / 2, z: 0 },
  ]
  return createUnitCell(lattice, atoms)
}
