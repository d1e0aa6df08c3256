import type { AtomSet, RenderGroup, SpeciesStyle } from '@lattice-view/shared/types'

export type SpeciesStyles = Readonly<Record<string, SpeciesStyle>>

export const DEFAULT_SPECIES_STYLES: SpeciesStyles = Object.freeze({
  Ti: { color: 'silver', label: 'Ti' },
  Ni: { color: 'gold', label: 'Ni' },
})

export const FALLBACK_SPECIES_COLOR = 'slategray'

export const styleForSpecies = (
  symbol: string,
  styles: SpeciesStyles = DEFAULT_SPECIES_STYLES,
): SpeciesStyle =>
  Object.hasOwn(styles, symbol)
    ? styles[symbol]
    : { color: FALLBACK_SPECIES_COLOR, label: symbol }

/** 元素ごとの原子インデックスを出現順にまとめる。 */
export const groupAtomsBySpecies = (
  set: AtomSet,
  styles: SpeciesStyles = DEFAULT_SPECIES_STYLES,
): Array<RenderGroup> => {
  const groups = new Map<string, RenderGroup>()
  set.atoms.forEach((atom, index) => {
    const existing = groups.get(atom.symbol)
    if (existing) {
      existing.indices.push(index)
      return
    }
    groups.set(atom.symbol, {
      symbol: atom.symbol,
      style: styleForSpecies(atom.symbol, styles),
      indices: [index],
    })
  })
  return [...groups.values()]
}

export const countSpecies = (set: AtomSet): Record<string, number> => {
  const counts: Record<string, number> = {}
  for (const atom of set.atoms) {
    counts[atom.symbol] = (counts[atom.symbol] ?? 0) + 1
  }
  return counts
}
