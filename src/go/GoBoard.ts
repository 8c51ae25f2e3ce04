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

import { GoColor } from "./GoColor";
import { GoPoint, decodeVertex, encodeVertex } from "../util/coordinates";
import { Matrix, cloneMatrix, makeMatrix, matricesAreEqual, matrixKey } from "../util/matrix";

export const SUPPORTED_BOARD_SIZES: readonly number[] = [7, 9, 11, 13, 15, 17, 19];
export const DEFAULT_BOARD_SIZE = 19;

export type StoneString = GoPoint[];

export interface GoBoardConfig {
    size?: number;
    board?: Matrix<GoColor>;
}

/** The stones on a square board, plus the flood fill helpers the rules need. */
export class GoBoard {
    public readonly size: number;
    public board: Matrix<GoColor>;

    /**
     * Constructs a new board. If size is not provided it is inferred from
     * the board matrix, or defaults to 19. A provided matrix is cloned.
     */
    constructor(config: GoBoardConfig = {}) {
        this.size = config.size ?? config.board?.length ?? DEFAULT_BOARD_SIZE;
        this.board = config.board
            ? cloneMatrix(config.board)
            : makeMatrix(this.size, this.size, GoColor.EMPTY);

        /* Sanity check */
        if (this.board.length !== this.size || this.board.some((row) => row.length !== this.size)) {
            throw new Error("Board size mismatch");
        }
    }

    public static isSupportedSize(size: number): boolean {
        return SUPPORTED_BOARD_SIZES.includes(size);
    }

    public cloneBoard(): GoBoard {
        return new GoBoard({ size: this.size, board: this.board });
    }

    public isOnBoard(pt: GoPoint): boolean {
        return pt.x >= 0 && pt.y >= 0 && pt.x < this.size && pt.y < this.size;
    }

    public get(pt: GoPoint): GoColor {
        return this.board[pt.y][pt.x];
    }

    public set(pt: GoPoint, color: GoColor): void {
        this.board[pt.y][pt.x] = color;
    }

    /** Returns the point for a GTP vertex like "C3", or undefined if it is not on this board */
    public pointAtVertex(vertex: string): GoPoint | undefined {
        return decodeVertex(vertex, this.size);
    }

    public vertexOf(pt: GoPoint): string {
        return encodeVertex(pt, this.size);
    }

    public countStones(color: GoColor): number {
        let ct = 0;
        for (const row of this.board) {
            for (const c of row) {
                if (c === color) {
                    ++ct;
                }
            }
        }
        return ct;
    }

    public foreachNeighbor(
        pt_or_string: GoPoint | StoneString,
        callback: (x: number, y: number) => void,
    ): void {
        if (pt_or_string instanceof Array) {
            const done = new Set<number>();
            for (const pt of pt_or_string) {
                done.add(pt.y * this.size + pt.x);
            }

            /* We only want to call the callback once per point */
            for (const pt of pt_or_string) {
                this.foreachNeighbor(pt, (x, y) => {
                    const idx = y * this.size + x;
                    if (!done.has(idx)) {
                        done.add(idx);
                        callback(x, y);
                    }
                });
            }
            return;
        }

        const pt = pt_or_string;
        if (pt.x - 1 >= 0) {
            callback(pt.x - 1, pt.y);
        }
        if (pt.x + 1 < this.size) {
            callback(pt.x + 1, pt.y);
        }
        if (pt.y - 1 >= 0) {
            callback(pt.x, pt.y - 1);
        }
        if (pt.y + 1 < this.size) {
            callback(pt.x, pt.y + 1);
        }
    }

    /** Returns all points connected to x,y that carry the same color */
    public getStoneString(x: number, y: number): StoneString {
        const color = this.board[y][x];
        const visited = new Set<number>();
        const to_check: GoPoint[] = [{ x, y }];
        const ret: StoneString = [];

        while (to_check.length) {
            const pt = to_check.pop();
            if (!pt) {
                break;
            }
            const idx = pt.y * this.size + pt.x;
            if (visited.has(idx)) {
                continue;
            }
            visited.add(idx);

            if (this.board[pt.y][pt.x] === color) {
                ret.push(pt);
                this.foreachNeighbor(pt, (nx, ny) => to_check.push({ x: nx, y: ny }));
            }
        }

        return ret;
    }

    /** Returns the distinct stone strings adjacent to the given one */
    public getNeighboringStoneStrings(stone_string: StoneString): StoneString[] {
        const seen = new Set<number>();
        const ret: StoneString[] = [];
        this.foreachNeighbor(stone_string, (x, y) => {
            if (this.board[y][x] === GoColor.EMPTY || seen.has(y * this.size + x)) {
                return;
            }
            const neighbor = this.getStoneString(x, y);
            for (const pt of neighbor) {
                seen.add(pt.y * this.size + pt.x);
            }
            ret.push(neighbor);
        });
        return ret;
    }

    public countLiberties(stone_string: StoneString): number {
        let ct = 0;
        this.foreachNeighbor(stone_string, (x, y) => {
            if (this.board[y][x] === GoColor.EMPTY) {
                ct += 1;
            }
        });
        return ct;
    }

    /** Removes the stones of the string and returns how many were removed */
    public captureStoneString(stone_string: StoneString): number {
        for (const pt of stone_string) {
            this.board[pt.y][pt.x] = GoColor.EMPTY;
        }
        return stone_string.length;
    }

    /** Compact key identifying the stone configuration */
    public positionKey(): string {
        return matrixKey(this.board);
    }

    /** Returns true if the `.board` field from the other board is equal to this one */
    public boardEquals(other: GoBoard): boolean {
        return matricesAreEqual(this.board, other.board);
    }
}
