import type { AtomSet, Scene } from '@lattice-view/shared/types'

import { computeBonds } from './bonds'
import type { BondStrategy } from './bonds'
import type { SharedParams } from './config'
import { createLogger } from './logger'
import { DEFAULT_SPECIES_STYLES, groupAtomsBySpecies } from './species'
import type { SpeciesStyles } from './species'
import { summarizeStructure } from './summary'
import { computeViewFrame } from './view-frame'

const logger = createLogger('lattice:scene')

export type BuildSceneInput = {
  id: string
  title: string
  atomSet: AtomSet
  params: Pick<SharedParams, 'bondDistance'>
  styles?: SpeciesStyles
  bondStrategy?: BondStrategy
}

/** 描画側に渡す原子・結合・視野・グループ一式を組み立てる。 */
export const buildScene = ({
  id,
  title,
  atomSet,
  params,
  styles = DEFAULT_SPECIES_STYLES,
  bondStrategy,
}: BuildSceneInput): Scene => {
  const frame = computeViewFrame(atomSet)
  const bonds = computeBonds(atomSet, params.bondDistance, {
    strategy: bondStrategy,
  })
  const scene: Scene = {
    id,
    title,
    atomSet,
    bonds,
    frame,
    groups: Object.freeze(
      groupAtomsBySpecies(atomSet, styles).map((group) => Object.freeze(group)),
    ),
    summary: summarizeStructure(atomSet),
  }
  logger.info('scene ready', {
    id,
    atoms: atomSet.atoms.length,
    bonds: bonds.length,
  })
  return Object.freeze(scene)
}
