import { describe, expect, it } from 'vitest'

import { buildB19Cell, buildB2Cell, NITINOL_B19, NITINOL_B2 } from './builders'
import { filterAtomSet } from './region'
import { replicate } from './replicate'
import { cellEdges, computeViewFrame, viewLimits } from './view-frame'
import { errorCodeOf } from './test/error-code'

import type { Vector3 } from '@lattice-view/shared/types'

const pointKey = (point: Vector3) =>
  [point.x, point.y, point.z].map((value) => value.toFixed(9)).join(',')

describe('computeViewFrame', () => {
  it('centres a cube on the B2 supercell', () => {
    const frame = computeViewFrame(replicate(buildB2Cell(NITINOL_B2), [2, 2, 2]))
    const far = 1.5075 + 3.015

    expect(frame.bounds.min).toEqual({ x: 0, y: 0, z: 0 })
    expect(frame.bounds.max).toEqual({ x: far, y: far, z: far })
    expect(frame.center).toEqual({ x: far * 0.5, y: far * 0.5, z: far * 0.5 })
    expect(frame.halfExtent).toBe(far / 2)
  })

  it('uses the widest span of the monoclinic supercell', () => {
    const set = replicate(buildB19Cell(NITINOL_B19), [2, 2, 2])
    const frame = computeViewFrame(set)
    const { min, max } = frame.bounds

    expect(frame.halfExtent).toBeCloseTo(6.8975006474522 / 2, 10)
    expect(frame.halfExtent).toBe((max.z - min.z) / 2)
    expect(min.x).toBeLessThan(0)
  })

  it('encloses every atom inside the cubic view volume', () => {
    const set = replicate(buildB19Cell(NITINOL_B19), [2, 2, 2])
    const frame = computeViewFrame(set)
    const limits = viewLimits(frame)

    for (const atom of set.atoms) {
      expect(atom.x).toBeGreaterThanOrEqual(limits.x[0])
      expect(atom.x).toBeLessThanOrEqual(limits.x[1])
      expect(atom.y).toBeGreaterThanOrEqual(limits.y[0])
      expect(atom.y).toBeLessThanOrEqual(limits.y[1])
      expect(atom.z).toBeGreaterThanOrEqual(limits.z[0])
      expect(atom.z).toBeLessThanOrEqual(limits.z[1])
    }
    expect(limits.z[0]).toBeCloseTo(frame.bounds.min.z, 12)
    expect(limits.z[1]).toBeCloseTo(frame.bounds.max.z, 12)
  })

  it('returns a frozen frame with frozen bounds and edges', () => {
    const frame = computeViewFrame(replicate(buildB19Cell(NITINOL_B19), [2, 2, 2]))

    expect(Object.isFrozen(frame)).toBe(true)
    expect(Object.isFrozen(frame.center)).toBe(true)
    expect(Object.isFrozen(frame.bounds)).toBe(true)
    expect(Object.isFrozen(frame.bounds.min)).toBe(true)
    expect(Object.isFrozen(frame.bounds.max)).toBe(true)
    expect(Object.isFrozen(frame.cellEdges)).toBe(true)
  })

  it('rejects an empty atom set', () => {
    const set = filterAtomSet(replicate(buildB2Cell(NITINOL_B2), [1, 1, 1]), () => false)

    expect(errorCodeOf(() => computeViewFrame(set))).toBe('EMPTY_RESULT')
  })
})

describe('cellEdges', () => {
  it('starts from the origin along the three cell vectors', () => {
    const set = replicate(buildB2Cell(NITINOL_B2), [2, 2, 2])
    const edges = computeViewFrame(set).cellEdges

    expect(edges).toHaveLength(12)
    expect(edges.slice(0, 3)).toEqual([
      { start: { x: 0, y: 0, z: 0 }, end: set.cell.a },
      { start: { x: 0, y: 0, z: 0 }, end: set.cell.b },
      { start: { x: 0, y: 0, z: 0 }, end: set.cell.c },
    ])
  })

  it('closes the parallelepiped with three edges at each of eight corners', () => {
    const { cell } = replicate(buildB19Cell(NITINOL_B19), [2, 1, 3])
    const edges = cellEdges(cell)
    const degree = new Map<string, number>()
    const segments = new Set<string>()

    for (const edge of edges) {
      const ends = [pointKey(edge.start), pointKey(edge.end)].sort()
      segments.add(ends.join('|'))
      for (const key of ends) {
        degree.set(key, (degree.get(key) ?? 0) + 1)
      }
    }

    expect(segments.size).toBe(12)
    expect(degree.size).toBe(8)
    expect([...degree.values()].every((count) => count === 3)).toBe(true)
  })

  it('gives every edge its own frozen endpoints', () => {
    const { cell } = replicate(buildB19Cell(NITINOL_B19), [2, 2, 2])
    const edges = cellEdges(cell)
    const endpoints = edges.flatMap((edge) => [edge.start, edge.end])

    expect(new Set(endpoints).size).toBe(24)
    for (const edge of edges) {
      expect(Object.isFrozen(edge)).toBe(true)
      expect(Object.isFrozen(edge.start)).toBe(true)
      expect(Object.isFrozen(edge.end)).toBe(true)
    }
    // a→ab, b→ab, ab→abc share the corner a+b by value only.
    expect(edges[3].end).toEqual(edges[5].end)
    expect(edges[3].end).not.toBe(edges[5].end)
    expect(edges[3].end).not.toBe(edges[9].start)
  })

  it('copies the lattice vectors into the edges', () => {
    const { cell } = replicate(buildB2Cell(NITINOL_B2), [1, 1, 1])
    const [first] = cellEdges(cell)

    expect(first.end).toEqual(cell.a)
    expect(first.end).not.toBe(cell.a)
  })
})
