import type { Scene } from '@lattice-view/shared/types'

import { NITINOL_B19, NITINOL_B2, buildB19Cell, buildB2Cell } from './builders'
import type { B19Params, B2Params } from './builders'
import { createSharedParams } from './config'
import type { SharedParams } from './config'
import { replicate } from './replicate'
import type { SpeciesStyles } from './species'
import { buildScene } from './scene'

export type PhaseComparisonInput = {
  params?: Readonly<SharedParams>
  austenite?: B2Params
  martensite?: B19Params
  styles?: SpeciesStyles
}

export type PhaseComparison = {
  params: Readonly<SharedParams>
  austenite: Scene
  martensite: Scene
}

export const AUSTENITE_TITLE = 'B2 Austenite (High Temperature)'
export const MARTENSITE_TITLE = "B19' Martensite (Low Temperature)"

/**
 * Builds the cubic and monoclinic phases side by side. Both scenes are derived
 * from the same frozen `params`, so bond cut-off and styling always match.
 */
export const buildPhaseComparison = ({
  params = createSharedParams(),
  austenite = NITINOL_B2,
  martensite = NITINOL_B19,
  styles,
}: PhaseComparisonInput = {}): PhaseComparison => {
  const b2 = replicate(buildB2Cell(austenite), params.repetitionsB2)
  const b19 = replicate(buildB19Cell(martensite), params.repetitionsB19)
  return {
    params,
    austenite: buildScene({
      id: 'b2',
      title: AUSTENITE_TITLE,
      atomSet: b2,
      params,
      styles,
    }),
    martensite: buildScene({
      id: 'b19',
      title: MARTENSITE_TITLE,
      atomSet: b19,
      params,
      styles,
    }),
  }
}
