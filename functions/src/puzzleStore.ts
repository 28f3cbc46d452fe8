import { Color, Edge, Move, PuzzleDescription } from "../../src/types";
import { parseColor } from "../../src/utils/colorUtils";
import { HardestPuzzleRecord } from "../../src/utils/generatorUtils";

export const HARDEST_COLLECTION = "hardestPuzzles";

// Document id for the hardest puzzle with `nodeCount` regions and `colorCount` colors
export const hardestPuzzleId = (nodeCount: number, colorCount: number): string => `${nodeCount}-${colorCount}`;

// Firestore rejects nested arrays, so edges are stored as maps
export type StoredEdge = {
    a: number;
    b: number;
}

export type StoredMove = {
    nodeId: number;
    color: string;
}

export type StoredHardestPuzzle = {
    algoScore: number;
    nodeCount: number;
    colorCount: number;
    description: {
        nodeCount: number;
        edges: StoredEdge[];
        colors: string[];
    };
    actions: StoredMove[];
    generatedAt: string;
}

export function toStoredMove(move: Move): StoredMove {
    return { nodeId: move.nodeId, color: move.color.name };
}

export function toStoredPuzzle(record: HardestPuzzleRecord, colorCount: number, generatedAt: string): StoredHardestPuzzle {
    const { description } = record;
    return {
        algoScore: record.moveCount,
        nodeCount: description.nodeCount,
        colorCount,
        description: {
            nodeCount: description.nodeCount,
            edges: description.edges.map(([a, b]) => ({ a, b })),
            colors: description.colors.map(color => color.name),
        },
        actions: record.solution.map(toStoredMove),
        generatedAt,
    };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const isCount = (value: unknown): value is number =>
    typeof value === "number" && Number.isInteger(value) && value >= 0;

const isColorName = (value: unknown): value is string =>
    typeof value === "string" && parseColor(value) !== null;

function isStoredEdge(value: unknown): value is StoredEdge {
    return isRecord(value) && isCount(value.a) && isCount(value.b);
}

function isStoredMove(value: unknown): value is StoredMove {
    return isRecord(value) && isCount(value.nodeId) && isColorName(value.color);
}

/**
 * Check a Firestore document against the stored hardest-puzzle shape.
 * Returns null when any field is missing or has the wrong type.
 */
export function parseStoredPuzzle(data: unknown): StoredHardestPuzzle | null {
    if (!isRecord(data)) {
        return null;
    }
    const { algoScore, nodeCount, colorCount, actions, generatedAt } = data;
    const description = data.description;
    if (!isRecord(description)) {
        return null;
    }
    const { edges, colors } = description;

    if (!isCount(algoScore) || !isCount(nodeCount) || !isCount(colorCount) || typeof generatedAt !== "string") {
        return null;
    }
    if (!isCount(description.nodeCount) || !Array.isArray(edges) || !Array.isArray(colors) || !Array.isArray(actions)) {
        return null;
    }
    if (!edges.every(isStoredEdge) || !colors.every(isColorName) || !actions.every(isStoredMove)) {
        return null;
    }
    if (actions.length !== algoScore) {
        return null;
    }

    return {
        algoScore,
        nodeCount,
        colorCount,
        description: { nodeCount: description.nodeCount, edges, colors },
        actions,
        generatedAt,
    };
}

/**
 * Turn stored color names and edge maps back into engine values.
 * Returns null when a color name no longer resolves.
 */
export function decodeDescription(stored: StoredHardestPuzzle["description"]): PuzzleDescription | null {
    const colors: Color[] = [];
    for (const name of stored.colors) {
        const color = parseColor(name);
        if (!color) return null;
        colors.push(color);
    }
    return {
        nodeCount: stored.nodeCount,
        edges: stored.edges.map(({ a, b }): Edge => [a, b]),
        colors,
    };
}
