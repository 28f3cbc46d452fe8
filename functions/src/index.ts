import * as admin from "firebase-admin";
import { onCall, HttpsError } from "firebase-functions/v2/https";
import { logger as v2Logger } from "firebase-functions/v2";
import { DateTime } from "luxon";
import { Color, Edge } from "../../src/types";
import { MalformedGraphError, PuzzleEngineError } from "../../src/types/errors";
import { HeuristicName, SearchStrategy, defaultSolverSettings } from "../../src/types/settings";
import { parseColor } from "../../src/utils/colorUtils";
import { buildPuzzle } from "../../src/utils/gameLogic";
import { findHardest } from "../../src/utils/generatorUtils";
import { formatSolution } from "../../src/utils/shareUtils";
import { solve } from "../../src/utils/solverUtils";
import {
    HARDEST_COLLECTION,
    StoredHardestPuzzle,
    StoredMove,
    hardestPuzzleId,
    parseStoredPuzzle,
    toStoredMove,
    toStoredPuzzle,
} from "./puzzleStore";

/**
 * App Check Strategy:
 *
 * 1. Production Environment:
 *    - App Check is strictly enforced (`enforceAppCheck: true`)
 *
 * 2. Emulator/Development Environment:
 *    - App Check is automatically disabled (`enforceAppCheck: false`)
 *    - The environment is detected using multiple methods (FUNCTIONS_EMULATOR env var, etc.)
 *
 * The `getAppCheckConfig()` helper function handles this logic.
 */

// Initialize Firebase app
admin.initializeApp();

// Initialize Firestore client
const db = admin.firestore();

const logger = v2Logger;

// Utility function to determine App Check enforcement based on environment
function getAppCheckConfig() {
    const isEmulatorEnv =
        process.env.FUNCTIONS_EMULATOR === 'true' ||
        process.env.FIRESTORE_EMULATOR_HOST !== undefined ||
        process.env.FIREBASE_CONFIG?.includes('"emulators"') ||
        process.env.NODE_ENV === 'development';

    logger.info(`Running in ${isEmulatorEnv ? 'emulator/development' : 'production'} environment. App Check will be ${isEmulatorEnv ? 'disabled' : 'enforced'}.`);

    return {
        enforceAppCheck: !isEmulatorEnv,
    };
}

/**
 * Read a positive integer limit from the environment, falling back when unset or invalid
 */
export function readLimit(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 1) {
        logger.warn(`Ignoring invalid ${name}=${raw}, using ${fallback}`);
        return fallback;
    }
    return value;
}

export const generatorLimits = () => ({
    maxNodes: readLimit("HARDEST_MAX_NODES", 6),
    maxColors: readLimit("HARDEST_MAX_COLORS", 6),
});

// The parts of a callable request the handlers read
export interface PuzzleRequest {
    data: unknown;
    auth?: { uid: string };
    app?: unknown;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const isPositiveInteger = (value: unknown): value is number =>
    typeof value === "number" && Number.isInteger(value) && value >= 1;

const isStrategy = (value: unknown): value is SearchStrategy =>
    Object.values(SearchStrategy).some(strategy => strategy === value);

const isHeuristicName = (value: unknown): value is HeuristicName =>
    value === HeuristicName.ColorCount || value === HeuristicName.MaxEdgeReduction;

export interface SolvePuzzlePayload {
    nodeCount: number;
    edges: Edge[];
    colors: Color[];
    strategy: SearchStrategy;
    heuristics: HeuristicName[];
}

/**
 * Validate the solvePuzzle payload. Graph-level problems (unknown ids,
 * disconnected graphs) are left to buildPuzzle.
 */
export function parseSolvePayload(data: unknown): SolvePuzzlePayload {
    if (!isRecord(data)) {
        throw new HttpsError("invalid-argument", "Expected an object payload.");
    }
    const { nodeCount, edges, colors, strategy, heuristics } = data;

    if (!isPositiveInteger(nodeCount)) {
        throw new HttpsError("invalid-argument", "\"nodeCount\" must be a positive integer.");
    }

    if (!Array.isArray(edges)) {
        throw new HttpsError("invalid-argument", "\"edges\" must be an array of [a, b] pairs.");
    }
    const parsedEdges: Edge[] = [];
    for (const edge of edges) {
        if (!Array.isArray(edge) || edge.length !== 2 || !edge.every(id => typeof id === "number" && Number.isInteger(id))) {
            throw new HttpsError("invalid-argument", "\"edges\" must be an array of [a, b] pairs.");
        }
        const [a, b] = edge;
        parsedEdges.push([a, b]);
    }

    if (!Array.isArray(colors) || colors.length !== nodeCount) {
        throw new HttpsError("invalid-argument", "\"colors\" must name one color per node.");
    }
    const parsedColors: Color[] = [];
    for (const name of colors) {
        const color = typeof name === "string" ? parseColor(name) : null;
        if (!color) {
            throw new HttpsError("invalid-argument", `Unknown color: ${String(name)}`);
        }
        parsedColors.push(color);
    }

    let parsedStrategy = defaultSolverSettings.strategy;
    if (strategy !== undefined) {
        if (!isStrategy(strategy)) {
            throw new HttpsError("invalid-argument", `Unknown strategy: ${String(strategy)}`);
        }
        parsedStrategy = strategy;
    }

    let parsedHeuristics = defaultSolverSettings.heuristics;
    if (heuristics !== undefined) {
        if (!Array.isArray(heuristics) || !heuristics.every(isHeuristicName)) {
            throw new HttpsError("invalid-argument", "\"heuristics\" must list known heuristic names.");
        }
        parsedHeuristics = heuristics;
    }

    return {
        nodeCount,
        edges: parsedEdges,
        colors: parsedColors,
        strategy: parsedStrategy,
        heuristics: parsedHeuristics,
    };
}

/**
 * Validate a `{ nodeCount, colorCount }` pair against the configured generator limits
 */
export function parseHardestPayload(data: unknown): { nodeCount: number; colorCount: number; fuzzy: boolean } {
    if (!isRecord(data)) {
        throw new HttpsError("invalid-argument", "Expected an object payload.");
    }
    const { nodeCount, colorCount, fuzzy } = data;
    const { maxNodes, maxColors } = generatorLimits();

    if (!isPositiveInteger(nodeCount) || nodeCount > maxNodes) {
        throw new HttpsError("invalid-argument", `"nodeCount" must be an integer between 1 and ${maxNodes}.`);
    }
    const colorLimit = Math.min(nodeCount, maxColors);
    if (!isPositiveInteger(colorCount) || colorCount > colorLimit) {
        throw new HttpsError("invalid-argument", `"colorCount" must be an integer between 1 and ${colorLimit}.`);
    }
    if (fuzzy !== undefined && typeof fuzzy !== "boolean") {
        throw new HttpsError("invalid-argument", "\"fuzzy\" must be a boolean.");
    }

    return { nodeCount, colorCount, fuzzy: fuzzy === true };
}

export interface SolvePuzzleResponse {
    success: true;
    moveCount: number;
    moves: StoredMove[];
    lines: string[];
}

export async function solvePuzzleHandler(request: PuzzleRequest): Promise<SolvePuzzleResponse> {
    const userId = request.auth?.uid || "guest/unauthenticated";
    logger.info(`solvePuzzle invoked by user: ${userId}, App Check verified: ${!!request.app}`);

    const payload = parseSolvePayload(request.data);

    try {
        const puzzle = buildPuzzle(payload.nodeCount, payload.edges, payload.colors);
        const moves = solve(puzzle, payload.strategy, payload.heuristics);
        logger.info(`solvePuzzle: solved ${payload.nodeCount}-node puzzle in ${moves.length} moves`);

        return {
            success: true,
            moveCount: moves.length,
            moves: moves.map(toStoredMove),
            lines: formatSolution(moves),
        };
    } catch (error) {
        if (error instanceof MalformedGraphError) {
            logger.warn(`solvePuzzle: rejected puzzle: ${error.reason}`);
            throw new HttpsError("invalid-argument", error.message);
        }
        logger.error("solvePuzzle: error while solving:", error);
        if (error instanceof HttpsError) {
            throw error;
        }
        const message = error instanceof PuzzleEngineError ? error.message : "Internal server error solving puzzle";
        throw new HttpsError("internal", message);
    }
}

export async function generateHardestPuzzleHandler(request: PuzzleRequest): Promise<{ success: true; data: StoredHardestPuzzle }> {
    if (!request.auth) {
        logger.error("generateHardestPuzzle: unauthenticated call");
        throw new HttpsError("unauthenticated", "Authentication required.");
    }
    const { nodeCount, colorCount, fuzzy } = parseHardestPayload(request.data);
    const docId = hardestPuzzleId(nodeCount, colorCount);
    logger.info(`generateHardestPuzzle: searching ${docId} for user ${request.auth.uid}`, { fuzzy });

    try {
        const record = findHardest(nodeCount, colorCount, { fuzzyInstances: fuzzy });
        if (!record) {
            throw new HttpsError("not-found", `No puzzle exists with ${nodeCount} nodes and ${colorCount} colors`);
        }

        const generatedAt = DateTime.utc().toFormat("yyyy-MM-dd'T'HH:mm:ss'Z'");
        const stored = toStoredPuzzle(record, colorCount, generatedAt);
        await db.collection(HARDEST_COLLECTION).doc(docId).set(stored);
        logger.info(`generateHardestPuzzle: stored ${docId} with ${stored.algoScore} moves`);

        return { success: true, data: stored };
    } catch (error) {
        logger.error(`generateHardestPuzzle: error for ${docId}:`, error);
        if (error instanceof HttpsError) {
            throw error;
        }
        throw new HttpsError("internal", "Internal server error generating puzzle");
    }
}

export async function fetchHardestPuzzleHandler(request: PuzzleRequest): Promise<{ success: true; data: StoredHardestPuzzle }> {
    const userId = request.auth?.uid || "guest/unauthenticated";
    logger.info(`fetchHardestPuzzle invoked by user: ${userId}, App Check verified: ${!!request.app}`);

    const { nodeCount, colorCount } = parseHardestPayload(request.data);
    const docId = hardestPuzzleId(nodeCount, colorCount);

    try {
        const snap = await db.collection(HARDEST_COLLECTION).doc(docId).get();
        if (!snap.exists) {
            logger.warn(`fetchHardestPuzzle: no puzzle stored for ${docId}`);
            throw new HttpsError("not-found", `Hardest puzzle not found for ${docId}`);
        }

        const stored = parseStoredPuzzle(snap.data());
        if (!stored) {
            logger.error(`fetchHardestPuzzle: invalid puzzle data format for ${docId}`);
            throw new HttpsError("internal", "Invalid puzzle data format found.");
        }

        return { success: true, data: stored };
    } catch (error) {
        logger.error(`fetchHardestPuzzle: error for ${docId}:`, error);
        if (error instanceof HttpsError) {
            throw error;
        }
        throw new HttpsError("internal", "Internal server error fetching puzzle");
    }
}

/**
 * v2 Firebase Cloud Function that solves a puzzle sent by the caller
 */
export const solvePuzzle = onCall(
    {
        memory: "256MiB",
        timeoutSeconds: 60,
        ...getAppCheckConfig(),
    },
    solvePuzzleHandler
);

/**
 * v2 Firebase Cloud Function that searches for and stores the hardest puzzle of a size
 */
export const generateHardestPuzzle = onCall(
    {
        memory: "1GiB",
        timeoutSeconds: 540,
        ...getAppCheckConfig(),
    },
    generateHardestPuzzleHandler
);

/**
 * v2 Firebase Cloud Function to fetch a stored hardest puzzle
 */
export const fetchHardestPuzzle = onCall(
    {
        memory: "256MiB",
        timeoutSeconds: 60,
        ...getAppCheckConfig(),
    },
    fetchHardestPuzzleHandler
);
