import { Color, Move, NodeId, TileColor } from '../types';
import { getTileColor } from './colorUtils';
import { RegionGraph } from './gameLogic';
import { HardestPuzzleRecord } from './generatorUtils';

/**
 * Convert a Color to an emoji representation for sharing
 */
export function colorToEmoji(color: Color): string {
  const colorEmojis = {
    [TileColor.Red]: "🟥",
    [TileColor.Green]: "🟩",
    [TileColor.Blue]: "🟦",
    [TileColor.Yellow]: "🟨",
    [TileColor.Purple]: "🟪",
    [TileColor.Orange]: "🟧"
  };
  const tile = getTileColor(color);
  return tile ? colorEmojis[tile] : "⬜";
}

/**
 * Convert a Color to a display name. Minted colors keep their identifier.
 */
export function colorToName(color: Color): string {
  const colorNames = {
    [TileColor.Red]: "Red",
    [TileColor.Green]: "Green",
    [TileColor.Blue]: "Blue",
    [TileColor.Yellow]: "Yellow",
    [TileColor.Purple]: "Purple",
    [TileColor.Orange]: "Orange",
  };
  const tile = getTileColor(color);
  return tile ? colorNames[tile] : color.name;
}

// Display name of a region, or undefined to fall back to its id
export type SectionNamer = (id: NodeId) => string | undefined;

// `index` is zero-based; lines are numbered from 1
export function formatMove(move: Move, index: number, sectionName?: SectionNamer): string {
  const section = sectionName?.(move.nodeId);
  const target = section === undefined ? `node ${move.nodeId}` : section;
  return `${index + 1}. Set ${target} to ${colorToName(move.color)}`;
}

export function formatSolution(moves: readonly Move[], sectionName?: SectionNamer): string[] {
  const lines = moves.map((move, index) => formatMove(move, index, sectionName));
  lines.push(`Total: ${moves.length} ${moves.length === 1 ? 'move' : 'moves'}`);
  return lines;
}

/**
 * One line per live region, in ascending id order
 */
export function describePuzzle(graph: RegionGraph): string[] {
  const lines: string[] = [];
  for (const id of graph.ids()) {
    const node = graph.getNode(id);
    if (!node) continue;
    lines.push(`Node ${id}: ${colorToName(node.color)}, neighbors [${graph.neighborsOf(id).join(', ')}]`);
  }
  return lines;
}

/**
 * Function to generate share text with emojis
 */
export function generateShareText(record: HardestPuzzleRecord): string {
  const { description, moveCount, solution } = record;
  const paletteSize = new Set(description.colors.map(color => color.index)).size;

  let shareText = `Hardest puzzle: ${description.nodeCount} nodes, ${paletteSize} colors\n`;
  shareText += `Score: ${moveCount} ${moveCount === 1 ? 'move' : 'moves'}\n\n`;
  shareText += `Board: ${description.colors.map(colorToEmoji).join("")}\n`;
  shareText += `Solution: ${solution.map(move => colorToEmoji(move.color)).join("")}\n`;

  return shareText;
}
