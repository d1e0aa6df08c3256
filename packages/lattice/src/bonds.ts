import type { AtomSet, BondEdge } from '@lattice-view/shared/types'

import { emptyResult, requireFinitePositive } from './errors'
import { createLogger } from './logger'
import { distance } from './vector'

const logger = createLogger('lattice:bonds')

export type BondStrategy = 'auto' | 'pairwise' | 'grid'

export type BondOptions = {
  strategy?: BondStrategy
}

/** 'auto' でグリッド探索に切り替える原子数の下限。 */
export const GRID_STRATEGY_MIN_ATOMS = 256

export const bondKey = (i: number, j: number): string =>
  i < j ? `${i}_${j}` : `${j}_${i}`

export const hasBond = (
  edges: ReadonlyArray<BondEdge>,
  i: number,
  j: number,
): boolean => {
  const key = bondKey(i, j)
  return edges.some((edge) => bondKey(edge.i, edge.j) === key)
}

const compareEdges = (left: BondEdge, right: BondEdge) =>
  left.i - right.i || left.j - right.j

const pairwiseBonds = (set: AtomSet, threshold: number): Array<BondEdge> => {
  const { atoms } = set
  const edges: Array<BondEdge> = []
  for (let i = 0; i < atoms.length; i += 1) {
    for (let j = i + 1; j < atoms.length; j += 1) {
      const length = distance(atoms[i], atoms[j])
      if (length < threshold) {
        edges.push({ i, j, length })
      }
    }
  }
  return edges
}

const binKey = (bx: number, by: number, bz: number) => `${bx}:${by}:${bz}`

// Bins have edge `threshold`, so any bonded pair sits in adjacent bins.
const gridBonds = (set: AtomSet, threshold: number): Array<BondEdge> => {
  const { atoms } = set
  const binOf = (value: number) => Math.floor(value / threshold)
  const bins = new Map<string, Array<number>>()
  atoms.forEach((atom, index) => {
    const key = binKey(binOf(atom.x), binOf(atom.y), binOf(atom.z))
    const bucket = bins.get(key)
    if (bucket) {
      bucket.push(index)
    } else {
      bins.set(key, [index])
    }
  })

  const edges: Array<BondEdge> = []
  atoms.forEach((atom, i) => {
    const bx = binOf(atom.x)
    const by = binOf(atom.y)
    const bz = binOf(atom.z)
    for (let dx = -1; dx <= 1; dx += 1) {
      for (let dy = -1; dy <= 1; dy += 1) {
        for (let dz = -1; dz <= 1; dz += 1) {
          const bucket = bins.get(binKey(bx + dx, by + dy, bz + dz))
          if (!bucket) continue
          for (const j of bucket) {
            if (j <= i) continue
            const length = distance(atom, atoms[j])
            if (length < threshold) {
              edges.push({ i, j, length })
            }
          }
        }
      }
    }
  })
  return edges.sort(compareEdges)
}

/**
 * Bonds every pair of atoms closer than `threshold` (strictly). Edges are
 * unique, satisfy `i < j` and come sorted by `(i, j)` whatever the strategy.
 * The returned array and every edge in it are frozen.
 */
export const computeBonds = (
  set: AtomSet,
  threshold: number,
  { strategy = 'auto' }: BondOptions = {},
): ReadonlyArray<BondEdge> => {
  requireFinitePositive('threshold', threshold)
  if (set.atoms.length === 0) {
    throw emptyResult('Cannot compute bonds for an empty atom set')
  }
  const resolved =
    strategy === 'auto'
      ? set.atoms.length >= GRID_STRATEGY_MIN_ATOMS
        ? 'grid'
        : 'pairwise'
      : strategy
  const edges =
    resolved === 'grid' ? gridBonds(set, threshold) : pairwiseBonds(set, threshold)

  logger.debug('computed bonds', {
    atoms: set.atoms.length,
    threshold,
    strategy: resolved,
    bonds: edges.length,
  })
  return Object.freeze(edges.map((edge) => Object.freeze(edge)))
}
