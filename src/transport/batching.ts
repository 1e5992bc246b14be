/**
 * @file Similarity Batching
 *
 * The similarity endpoint accepts at most MAX_SIMILARITY_ITEMS strings
 * per request. Larger requests are planned as blocks, each carrying the
 * offset at which its sub-matrix lands, and stitched back together.
 *
 * Self-similarity over N > limit items uses chunks of limit/2 and only
 * the upper triangle of block pairs; off-diagonal blocks are mirrored.
 * Cross-similarity keeps the smaller set whole when it can and chunks
 * the other with the remaining room, otherwise chunks both at limit/2.
 *
 * @module transport/batching
 */

import { RemoteFailureError } from '../errors.js';

export const MAX_SIMILARITY_ITEMS = 10_000;

export type SimilarityBody =
    | { set: string[] }
    | { set_a: string[]; set_b: string[] };

/**
 * One planned request.
 *
 * @property rowOffset - First matrix row the block covers
 * @property colOffset - First matrix column the block covers
 * @property mirror - Also write the transposed block at (colOffset, rowOffset)
 */
export interface SimilarityBlock {
    body: SimilarityBody;
    rows: number;
    cols: number;
    rowOffset: number;
    colOffset: number;
    mirror: boolean;
}

/** Split items into consecutive chunks of at most `size`. */
export function chunks_split<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

/**
 * Plan a self-similarity request.
 */
export function selfBlocks_plan(items: readonly string[], limit: number = MAX_SIMILARITY_ITEMS): SimilarityBlock[] {
    if (items.length <= limit) {
        return [{
            body: { set: [...items] },
            rows: items.length,
            cols: items.length,
            rowOffset: 0,
            colOffset: 0,
            mirror: false,
        }];
    }

    const chunks: string[][] = chunks_split(items, Math.floor(limit / 2));
    const offsets: number[] = offsets_compute(chunks);
    const blocks: SimilarityBlock[] = [];
    for (let i = 0; i < chunks.length; i++) {
        for (let j = i; j < chunks.length; j++) {
            blocks.push({
                body: i === j ? { set: chunks[i] } : { set_a: chunks[i], set_b: chunks[j] },
                rows: chunks[i].length,
                cols: chunks[j].length,
                rowOffset: offsets[i],
                colOffset: offsets[j],
                mirror: i !== j,
            });
        }
    }
    return blocks;
}

/**
 * Plan a cross-similarity request: rows are `setA`, columns `setB`.
 */
export function crossBlocks_plan(
    setA: readonly string[],
    setB: readonly string[],
    limit: number = MAX_SIMILARITY_ITEMS,
): SimilarityBlock[] {
    const a: number = setA.length;
    const b: number = setB.length;

    let chunksA: string[][];
    let chunksB: string[][];
    if (a + b <= limit) {
        chunksA = [[...setA]];
        chunksB = [[...setB]];
    } else if (a <= b && b < limit) {
        chunksA = [[...setA]];
        chunksB = chunks_split(setB, limit - a);
    } else if (b <= a && a < limit) {
        chunksA = chunks_split(setA, limit - b);
        chunksB = [[...setB]];
    } else {
        const half: number = Math.floor(limit / 2);
        chunksA = chunks_split(setA, half);
        chunksB = chunks_split(setB, half);
    }

    const offsetsA: number[] = offsets_compute(chunksA);
    const offsetsB: number[] = offsets_compute(chunksB);
    const blocks: SimilarityBlock[] = [];
    chunksA.forEach((chunkA: string[], i: number) => {
        chunksB.forEach((chunkB: string[], j: number) => {
            blocks.push({
                body: { set_a: chunkA, set_b: chunkB },
                rows: chunkA.length,
                cols: chunkB.length,
                rowOffset: offsetsA[i],
                colOffset: offsetsB[j],
                mirror: false,
            });
        });
    });
    return blocks;
}

/**
 * Assemble block matrices into the full rows × cols matrix.
 *
 * @param matrices - One sub-matrix per block, in plan order
 * @throws {RemoteFailureError} If a block's shape does not match its plan
 */
export function blocks_stitch(
    rows: number,
    cols: number,
    blocks: readonly SimilarityBlock[],
    matrices: readonly number[][][],
): number[][] {
    if (matrices.length !== blocks.length) {
        throw new RemoteFailureError(
            `Expected ${blocks.length} similarity blocks, received ${matrices.length}`,
            null,
        );
    }
    const matrix: number[][] = Array.from({ length: rows }, () => new Array<number>(cols).fill(0));

    blocks.forEach((block: SimilarityBlock, k: number) => {
        const sub: number[][] = matrices[k];
        if (sub.length !== block.rows || sub.some(row => row.length !== block.cols)) {
            throw new RemoteFailureError(
                `Similarity block ${k} does not have the planned shape ${block.rows}x${block.cols}`,
                null,
            );
        }
        for (let r = 0; r < block.rows; r++) {
            for (let c = 0; c < block.cols; c++) {
                matrix[block.rowOffset + r][block.colOffset + c] = sub[r][c];
                if (block.mirror) {
                    matrix[block.colOffset + c][block.rowOffset + r] = sub[r][c];
                }
            }
        }
    });
    return matrix;
}

function offsets_compute(chunks: readonly string[][]): number[] {
    const offsets: number[] = [];
    let offset = 0;
    for (const chunk of chunks) {
        offsets.push(offset);
        offset += chunk.length;
    }
    return offsets;
}
