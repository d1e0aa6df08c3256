import type { Atom, AtomSet, RepeatCounts, UnitCell } from '@lattice-view/shared/types'

import { validateRepeatCounts } from './config'
import { createLogger } from './logger'
import { freezeAtoms, freezeLattice } from './unit-cell'
import { add, scale, scaleLattice } from './vector'

const logger = createLogger('lattice:replicate')

export const atomCountForSupercell = (
  baseAtoms: number,
  repeats: ReadonlyArray<number>,
): number => baseAtoms * repeats.reduce((product, value) => product * value, 1)

/**
 * Tiles `cell` along its lattice vectors. Atoms come out replica by replica
 * (i outermost, then j, then k), each replica listing the unit-cell atoms in
 * their original order.
 */
export const replicate = (
  cell: UnitCell,
  repeats: ReadonlyArray<number>,
): AtomSet => {
  const counts: RepeatCounts = validateRepeatCounts('repeats', repeats)
  const [nx, ny, nz] = counts
  const { a, b, c } = cell.lattice
  const atoms: Array<Atom> = []

  for (let i = 0; i < nx; i += 1) {
    for (let j = 0; j < ny; j += 1) {
      for (let k = 0; k < nz; k += 1) {
        const offset = add(add(scale(a, i), scale(b, j)), scale(c, k))
        for (const atom of cell.atoms) {
          atoms.push({
            symbol: atom.symbol,
            x: atom.x + offset.x,
            y: atom.y + offset.y,
            z: atom.z + offset.z,
          })
        }
      }
    }
  }

  logger.debug('replicated unit cell', {
    baseAtoms: cell.atoms.length,
    repeats: counts,
    atoms: atoms.length,
  })

  return Object.freeze({
    atoms: freezeAtoms(atoms),
    cell: freezeLattice(scaleLattice(cell.lattice, counts)),
  })
}
