import type {
  AtomSet,
  CellEdge,
  Lattice,
  Vector3,
  ViewFrame,
  ViewLimits,
} from '@lattice-view/shared/types'

import { emptyResult } from './errors'
import { ORIGIN, add } from './vector'

const freezePoint = ({ x, y, z }: Vector3): Vector3 => Object.freeze({ x, y, z })

/** セル外枠の 12 辺。原点・各ベクトル和を頂点とする平行六面体。 */
export const cellEdges = ({ a, b, c }: Lattice): ReadonlyArray<CellEdge> => {
  const ab = add(a, b)
  const ac = add(a, c)
  const bc = add(b, c)
  const abc = add(ab, c)
  // 頂点は辺ごとに複製する。辺同士で座標オブジェクトを共有しない。
  const edge = (start: Vector3, end: Vector3): CellEdge =>
    Object.freeze({ start: freezePoint(start), end: freezePoint(end) })
  return Object.freeze([
    edge(ORIGIN, a),
    edge(ORIGIN, b),
    edge(ORIGIN, c),
    edge(a, ab),
    edge(a, ac),
    edge(b, ab),
    edge(b, bc),
    edge(c, ac),
    edge(c, bc),
    edge(ab, abc),
    edge(ac, abc),
    edge(bc, abc),
  ])
}

export const computeViewFrame = (set: AtomSet): ViewFrame => {
  if (set.atoms.length === 0) {
    throw emptyResult('Cannot frame an empty atom set')
  }
  const min = { x: Infinity, y: Infinity, z: Infinity }
  const max = { x: -Infinity, y: -Infinity, z: -Infinity }
  for (const atom of set.atoms) {
    min.x = Math.min(min.x, atom.x)
    min.y = Math.min(min.y, atom.y)
    min.z = Math.min(min.z, atom.z)
    max.x = Math.max(max.x, atom.x)
    max.y = Math.max(max.y, atom.y)
    max.z = Math.max(max.z, atom.z)
  }
  const span = Math.max(max.x - min.x, max.y - min.y, max.z - min.z)
  return Object.freeze({
    center: freezePoint({
      x: (max.x + min.x) * 0.5,
      y: (max.y + min.y) * 0.5,
      z: (max.z + min.z) * 0.5,
    }),
    halfExtent: span / 2,
    bounds: Object.freeze({ min: freezePoint(min), max: freezePoint(max) }),
    cellEdges: cellEdges(set.cell),
  })
}

/** Equal-aspect axis limits centred on the atoms. */
export const viewLimits = ({ center, halfExtent }: ViewFrame): ViewLimits => ({
  x: [center.x - halfExtent, center.x + halfExtent],
  y: [center.y - halfExtent, center.y + halfExtent],
  z: [center.z - halfExtent, center.z + halfExtent],
})
