import type { AtomSet, StructureSummary } from '@lattice-view/shared/types'

import { countSpecies } from './species'
import { cellParameters } from './unit-cell'

export const summarizeStructure = (set: AtomSet): StructureSummary => ({
  atomCount: set.atoms.length,
  speciesCounts: countSpecies(set),
  cellParameters: cellParameters(set.cell),
})

const fixed = (value: number, digits: number) => value.toFixed(digits)

/** Text lines describing a structure, one fact per line. */
export const formatStructureSummary = (
  label: string,
  { atomCount, speciesCounts, cellParameters: cell }: StructureSummary,
): Array<string> => [
  `${label}: ${atomCount} atoms`,
  ...Object.entries(speciesCounts).map(
    ([symbol, count]) => `  ${symbol} atoms: ${count}`,
  ),
  `  Cell lengths: a=${fixed(cell.a, 3)} Å, b=${fixed(cell.b, 3)} Å, c=${fixed(cell.c, 3)} Å`,
  `  Cell angles: α=${fixed(cell.alpha, 1)}°, β=${fixed(cell.beta, 1)}°, γ=${fixed(cell.gamma, 1)}°`,
]
