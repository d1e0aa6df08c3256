export type Vector3 = {
  x: number
  y: number
  z: number
}

export type Atom = {
  symbol: string
  x: number
  y: number
  z: number
}

export type Lattice = {
  a: Vector3
  b: Vector3
  c: Vector3
}

export type LatticeAxis = keyof Lattice

export type CellParameters = {
  a: number
  b: number
  c: number
  alpha: number
  beta: number
  gamma: number
}

export type RepeatCounts = [number, number, number]

export type UnitCell = {
  readonly lattice: Lattice
  readonly atoms: ReadonlyArray<Atom>
}

/** タイリング後の原子集合。`cell` は描画用の外枠セル。 */
export type AtomSet = {
  readonly atoms: ReadonlyArray<Atom>
  readonly cell: Lattice
}

export type BondEdge = {
  i: number
  j: number
  length: number
}

export type AxisBounds = {
  min: Vector3
  max: Vector3
}

export type CellEdge = {
  start: Vector3
  end: Vector3
}

export type ViewFrame = {
  center: Vector3
  halfExtent: number
  bounds: AxisBounds
  cellEdges: ReadonlyArray<CellEdge>
}

export type ViewLimits = {
  x: [number, number]
  y: [number, number]
  z: [number, number]
}

export type SpeciesStyle = {
  color: string
  label: string
}

export type RenderGroup = {
  symbol: string
  style: SpeciesStyle
  indices: Array<number>
}

export type StructureSummary = {
  atomCount: number
  speciesCounts: Record<string, number>
  cellParameters: CellParameters
}

export type Scene = {
  id: string
  title: string
  atomSet: AtomSet
  bonds: ReadonlyArray<BondEdge>
  frame: ViewFrame
  groups: ReadonlyArray<RenderGroup>
  summary: StructureSummary
}
