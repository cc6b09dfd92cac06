// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export type Vector = number[] | Float32Array;

/**
 * Return the dot product of two vectors
 * @param x
 * @param y
 * @returns
 */
export function dotProduct(x: Vector, y: Vector): number {
    if (x.length != y.length) {
        throw new Error(`Array length mismatch: ${x.length} != ${y.length}`);
    }
    let sum = 0;
    for (let i = 0; i < x.length; ++i) {
        sum += x[i] * y[i];
    }
    return sum;
}

export function euclideanLength(x: Vector): number {
    return Math.sqrt(dotProduct(x, x));
}

export function normalizeInPlace(v: Vector): void {
    const length = euclideanLength(v);
    if (length > 0) {
        for (let i = 0; i < v.length; ++i) {
            v[i] /= length;
        }
    }
}
