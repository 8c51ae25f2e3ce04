/*
 * Copyright (C) Online-Go.com
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *  http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

export type Matrix<T> = T[][];

export function makeMatrix<T = number>(width: number, height: number, initialValue: T): Matrix<T> {
    const ret: Matrix<T> = [];
    for (let y = 0; y < height; ++y) {
        ret.push(new Array<T>(width).fill(initialValue));
    }
    return ret;
}

/** Returns a cloned copy of the provided matrix */
export function cloneMatrix<T>(matrix: Matrix<T>): Matrix<T> {
    return matrix.map((row) => row.slice());
}

/**
 * Returns true if the contents of the two 2d matrices are equal when the
 * cells are compared with ===
 */
export function matricesAreEqual<T>(m1: Matrix<T>, m2: Matrix<T>): boolean {
    if (m1.length !== m2.length) {
        return false;
    }

    for (let y = 0; y < m1.length; ++y) {
        if (m1[y].length !== m2[y].length) {
            return false;
        }
        for (let x = 0; x < m1[y].length; ++x) {
            if (m1[y][x] !== m2[y][x]) {
                return false;
            }
        }
    }
    return true;
}

/** Compact string key for a number matrix, used to detect repeated positions */
export function matrixKey(matrix: Matrix<number>): string {
    return matrix.map((row) => row.join("")).join("/");
}
