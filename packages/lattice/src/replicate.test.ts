import { describe, expect, it } from 'vitest'

import { buildB19Cell, buildB2Cell, NITINOL_B19, NITINOL_B2 } from './builders'
import { atomCountForSupercell, replicate } from './replicate'
import { countSpecies } from './species'
import { errorCodeOf } from './test/error-code'

describe('replicate', () => {
  it('tiles the B2 cell into 16 atoms split evenly between species', () => {
    const set = replicate(buildB2Cell(NITINOL_B2), [2, 2, 2])

    expect(set.atoms).toHaveLength(16)
    expect(countSpecies(set)).toEqual({ Ti: 8, Ni: 8 })
  })

  it('tiles the B19 cell into 32 atoms', () => {
    const set = replicate(buildB19Cell(NITINOL_B19), [2, 2, 2])

    expect(set.atoms).toHaveLength(32)
    expect(countSpecies(set)).toEqual({ Ti: 16, Ni: 16 })
  })

  it('emits replicas with k innermost and unit-cell atoms in order', () => {
    const set = replicate(buildB2Cell(NITINOL_B2), [2, 2, 2])

    expect(set.atoms.slice(0, 4)).toEqual([
      { symbol: 'Ti', x: 0, y: 0, z: 0 },
      { symbol: 'Ni', x: 1.5075, y: 1.5075, z: 1.5075 },
      { symbol: 'Ti', x: 0, y: 0, z: 3.015 },
      { symbol: 'Ni', x: 1.5075, y: 1.5075, z: 1.5075 + 3.015 },
    ])
    expect(set.atoms[4]).toEqual({ symbol: 'Ti', x: 0, y: 3.015, z: 0 })
    expect(set.atoms[8]).toEqual({ symbol: 'Ti', x: 3.015, y: 0, z: 0 })
  })

  it('scales each cell vector by its repeat count', () => {
    const set = replicate(buildB2Cell(NITINOL_B2), [2, 3, 4])

    expect(set.cell).toEqual({
      a: { x: 3.015 * 2, y: 0, z: 0 },
      b: { x: 0, y: 3.015 * 3, z: 0 },
      c: { x: 0, y: 0, z: 3.015 * 4 },
    })
  })

  it('accumulates oblique offsets for the monoclinic cell', () => {
    const cell = buildB19Cell(NITINOL_B19)
    const set = replicate(cell, [1, 1, 2])

    expect(set.atoms[4].x).toBeCloseTo(cell.lattice.c.x, 12)
    expect(set.atoms[4].z).toBeCloseTo(cell.lattice.c.z, 12)
  })

  it('is deterministic', () => {
    const cell = buildB19Cell(NITINOL_B19)

    expect(replicate(cell, [2, 1, 3])).toEqual(replicate(cell, [2, 1, 3]))
  })

  it('returns frozen output', () => {
    const set = replicate(buildB2Cell(NITINOL_B2), [1, 1, 1])

    expect(Object.isFrozen(set)).toBe(true)
    expect(Object.isFrozen(set.atoms)).toBe(true)
    expect(Object.isFrozen(set.cell)).toBe(true)
  })

  it('rejects non-positive, fractional or missing repeat counts', () => {
    const cell = buildB2Cell(NITINOL_B2)

    expect(errorCodeOf(() => replicate(cell, [0, 1, 1]))).toBe('INVALID_PARAMETER')
    expect(errorCodeOf(() => replicate(cell, [1, -2, 1]))).toBe('INVALID_PARAMETER')
    expect(errorCodeOf(() => replicate(cell, [1, 1, 1.5]))).toBe('INVALID_PARAMETER')
    expect(errorCodeOf(() => replicate(cell, [1, 1]))).toBe('INVALID_PARAMETER')
  })
})

describe('atomCountForSupercell', () => {
  it('multiplies the base count by every repeat', () => {
    expect(atomCountForSupercell(4, [2, 2, 3])).toBe(48)
  })
})
