// Types & Data
export enum TileColor {
  Red = 'red',
  Green = 'green',
  Blue = 'blue',
  Yellow = 'yellow',
  Purple = 'purple',
  Orange = 'orange'
}

// Named prefix of the color space; indices past the end are minted on demand
export const allColors = [
  TileColor.Red,
  TileColor.Green,
  TileColor.Blue,
  TileColor.Yellow,
  TileColor.Purple,
  TileColor.Orange
];

/**
 * A region color. Equality and ordering are by index; the name is either a
 * TileColor value or `color-<index>` for minted colors.
 */
export interface Color {
  readonly index: number;
  readonly name: string;
}

export type NodeId = number;

export type Edge = readonly [NodeId, NodeId];

export interface RegionNode {
  readonly id: NodeId;
  readonly color: Color;
  readonly neighbors: ReadonlySet<NodeId>;
}

export interface Move {
  nodeId: NodeId;
  color: Color;
}

/**
 * In-memory description of an instance: `colors[id]` is the color of node `id`.
 */
export interface PuzzleDescription {
  nodeCount: number;
  edges: Edge[];
  colors: Color[];
}

export type Coloring = readonly Color[] | ReadonlyMap<NodeId, Color>;
