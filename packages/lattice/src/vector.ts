import type { Lattice, Vector3 } from '@lattice-view/shared/types'

export const ORIGIN: Vector3 = Object.freeze({ x: 0, y: 0, z: 0 })

export const vec = (x: number, y: number, z: number): Vector3 => ({ x, y, z })

export const add = (a: Vector3, b: Vector3): Vector3 => ({
  x: a.x + b.x,
  y: a.y + b.y,
  z: a.z + b.z,
})

export const sub = (a: Vector3, b: Vector3): Vector3 => ({
  x: a.x - b.x,
  y: a.y - b.y,
  z: a.z - b.z,
})

export const scale = (v: Vector3, s: number): Vector3 => ({
  x: v.x * s,
  y: v.y * s,
  z: v.z * s,
})

export const dot = (a: Vector3, b: Vector3) => a.x * b.x + a.y * b.y + a.z * b.z

export const cross = (a: Vector3, b: Vector3): Vector3 => ({
  x: a.y * b.z - a.z * b.y,
  y: a.z * b.x - a.x * b.z,
  z: a.x * b.y - a.y * b.x,
})

export const norm = (v: Vector3) => Math.hypot(v.x, v.y, v.z)

export const distance = (a: Vector3, b: Vector3) =>
  Math.hypot(a.x - b.x, a.y - b.y, a.z - b.z)

export const isFiniteVector = (v: Vector3) =>
  Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z)

/** 2 ベクトルのなす角を度で返す。 */
export const angleBetween = (a: Vector3, b: Vector3): number => {
  const denom = norm(a) * norm(b)
  if (denom === 0) {
    return 0
  }
  const cosine = Math.min(1, Math.max(-1, dot(a, b) / denom))
  return (Math.acos(cosine) * 180) / Math.PI
}

export const scaleLattice = (
  lattice: Lattice,
  [na, nb, nc]: [number, number, number],
): Lattice => ({
  a: scale(lattice.a, na),
  b: scale(lattice.b, nb),
  c: scale(lattice.c, nc),
})
