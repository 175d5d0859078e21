import { performance } from 'perf_hooks';
import {
    GreedyStringTiling,
    prepareSequences,
    verifyTiling,
    type Match,
    type TilingOptions
} from '../src/index.js';

// --- Setup ---

interface BenchmarkResult {
    name: string;
    time: number;
    memory: number;
    tiles: number;
    coverage: number;
    correctness: '✅ OK' | '❌ FAILED';
}

interface Subject {
    name: string;
    options: Required<TilingOptions>;
}

// mulberry32, so every run benchmarks the same inputs
function createRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

const vocabulary = [
    'const', 'let', 'if', 'else', 'for', 'return', 'function', '(', ')', '{', '}', ';', '=', '+', '-', '*',
    '<', '>', '.', ',', 'i', 'j', 'n', 'x', 'y', 'result', 'items', 'length', 'push', '0', '1', 'true'
];

/**
 * Generates a token stream that looks vaguely like code.
 */
function generateTokens(random: () => number, count: number): string[] {
    const tokens: string[] = [];
    for (let i = 0; i < count; i++) {
        tokens.push(vocabulary[Math.floor(random() * vocabulary.length)]);
    }
    return tokens;
}

/**
 * Copies `source` with its blocks reordered and some tokens renamed or inserted.
 */
function mutate(random: () => number, source: string[], blockSize: number, editRate: number): string[] {
    const blocks: string[][] = [];
    for (let i = 0; i < source.length; i += blockSize) {
        blocks.push(source.slice(i, i + blockSize));
    }
    for (let i = blocks.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [blocks[i], blocks[j]] = [blocks[j], blocks[i]];
    }

    const result: string[] = [];
    for (const token of blocks.flat()) {
        const roll = random();
        if (roll < editRate / 2) {
            result.push(`${token}_renamed`);
        } else if (roll < editRate) {
            result.push(token, 'inserted');
        } else {
            result.push(token);
        }
    }
    return result;
}

// --- Configurations ---
const subjects: Subject[] = [];
const initialSearchLengths = [10, 20, 40];
const minimumMatchLengths = [3, 5, 8];

for (const initialSearchLength of initialSearchLengths) {
    for (const minimumMatchLength of minimumMatchLengths) {
        subjects.push({
            name: `initialSearchLength=${initialSearchLength}, minimumMatchLength=${minimumMatchLength}`,
            options: { initialSearchLength, minimumMatchLength }
        });
    }
}

// --- Test Scenarios ---
type ScenarioGenerator = () => { pattern: string[]; text: string[] };

const scenarios: { [key: string]: ScenarioGenerator } = {
    'Reordered blocks, few edits (20k tokens)': () => {
        const random = createRandom(1);
        const pattern = generateTokens(random, 20000);
        return { pattern, text: mutate(random, pattern, 200, 0.01) };
    },
    'Reordered blocks, many edits (20k tokens)': () => {
        const random = createRandom(2);
        const pattern = generateTokens(random, 20000);
        return { pattern, text: mutate(random, pattern, 50, 0.1) };
    },
    'Unrelated sequences (20k tokens)': () => {
        const random = createRandom(3);
        return { pattern: generateTokens(random, 20000), text: generateTokens(random, 20000) };
    }
};

// --- Runner ---
function runBenchmark(subject: Subject, pattern: string[], text: string[]): BenchmarkResult {
    const gst = new GreedyStringTiling();

    // Warm-up run
    gst.tile(pattern, text, false, subject.options);

    if (global.gc) {
        global.gc();
    }

    const startHeap = process.memoryUsage().heapUsed;

    const startTime = performance.now();
    const tiles: Match[] = gst.tile(pattern, text, false, subject.options);
    const endTime = performance.now();

    const endHeap = process.memoryUsage().heapUsed;

    const tiled = tiles.reduce((sum, m) => sum + m.length, 0);

    let correctness: '✅ OK' | '❌ FAILED' = '❌ FAILED';
    try {
        const { patternTokens, textTokens } = prepareSequences(pattern, text);
        verifyTiling(patternTokens, textTokens, tiles, subject.options.minimumMatchLength);
        correctness = '✅ OK';
    } catch (e) {
        console.error(`Verification ERROR for ${subject.name}:`, e instanceof Error ? e.message : e);
    }

    return {
        name: subject.name,
        time: endTime - startTime,
        memory: (endHeap - startHeap) / 1024,
        tiles: tiles.length,
        coverage: pattern.length > 0 ? tiled / pattern.length : 0,
        correctness
    };
}

// --- Main Execution ---
function main(): void {
    console.log('Starting GreedyStringTiling Benchmark...\n');

    for (const scenarioName in scenarios) {
        console.log(`=== Scenario: ${scenarioName} ===`);
        const { pattern, text } = scenarios[scenarioName]();

        const rows: Array<Record<string, string | number>> = [];
        for (const subject of subjects) {
            try {
                const result = runBenchmark(subject, pattern, text);
                rows.push({
                    'Configuration': result.name,
                    'Time (ms)': result.time.toFixed(2),
                    'Heap Used (KB)': result.memory.toFixed(2),
                    'Tiles': result.tiles,
                    'Pattern Tiled (%)': (result.coverage * 100).toFixed(1),
                    'Correctness': result.correctness,
                });
            } catch (e) {
                console.error(`Run CRASHED for ${subject.name}:`, e instanceof Error ? e.message : e);
                rows.push({
                    'Configuration': subject.name,
                    'Time (ms)': 'CRASHED',
                    'Heap Used (KB)': 'N/A',
                    'Tiles': 'N/A',
                    'Pattern Tiled (%)': 'N/A',
                    'Correctness': '❌ FAILED',
                });
            }
        }
        rows.sort((a, b) => {
            if (a['Time (ms)'] === 'CRASHED') return 1;
            if (b['Time (ms)'] === 'CRASHED') return -1;
            return parseFloat(String(a['Time (ms)'])) - parseFloat(String(b['Time (ms)']));
        });
        console.table(rows);
        console.log('\n');
    }
}

main();
