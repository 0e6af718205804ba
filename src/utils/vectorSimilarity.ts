export type SparseVector = ReadonlyMap<string, number>;

export type WeightedVector = {
    readonly weights: SparseVector;
    readonly norm: number;
};

export const l2Norm = (weights: SparseVector): number => {
    let sumOfSquares = 0;
    for (const weight of weights.values()) sumOfSquares += weight * weight;
    return Math.sqrt(sumOfSquares);
};

/**
 * Cosine similarity clamped to [0, 1]. A zero-magnitude vector on either side scores 0.
 */
export const cosineSimilarity = (a: WeightedVector, b: WeightedVector): number => {
    if (a.norm === 0 || b.norm === 0) return 0;

    const [small, large] = a.weights.size <= b.weights.size ? [a.weights, b.weights] : [b.weights, a.weights];
    let dot = 0;
    for (const [term, weight] of small) {
        const other = large.get(term);
        if (other !== undefined) dot += weight * other;
    }

    const similarity = dot / (a.norm * b.norm);
    return Math.min(1, Math.max(0, similarity));
};
