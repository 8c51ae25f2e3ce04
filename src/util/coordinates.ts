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

/** A board intersection. The origin is the top left corner, as on screen. */
export interface GoPoint {
    x: number;
    y: number;
}

/* Upper case, and doesn't have I */
const VERTEX_COORDINATE_SEQUENCE = "ABCDEFGHJKLMNOPQRSTUVWXYZ";

/** Decodes the X part of a vertex ("C" in "C3") to a number, -1 if invalid */
export function decodeVertexXCoordinate(ch: string): number {
    if (ch.length !== 1) {
        return -1;
    }
    return VERTEX_COORDINATE_SEQUENCE.indexOf(ch.toUpperCase());
}

/** Encodes an X coordinate to its vertex letter */
export function encodeVertexXCoordinate(x: number): string {
    return VERTEX_COORDINATE_SEQUENCE[x];
}

/**
 * Decodes a GTP vertex like `"C3"` or `"k10"` on a board of the given size.
 * Returns undefined for malformed vertices and for vertices that are off the
 * board. `"pass"` is not a vertex and is not handled here.
 */
export function decodeVertex(vertex: string, board_size: number): GoPoint | undefined {
    const match = /^([A-Za-z])(\d{1,2})$/.exec(vertex.trim());
    if (!match) {
        return undefined;
    }
    const x = decodeVertexXCoordinate(match[1]);
    const row = parseInt(match[2], 10);
    if (x < 0 || x >= board_size || row < 1 || row > board_size) {
        return undefined;
    }
    return { x, y: board_size - row };
}

/** Encodes a point as a GTP vertex, like `"C3"` */
export function encodeVertex(point: GoPoint, board_size: number): string {
    return encodeVertexXCoordinate(point.x) + (board_size - point.y);
}

/** Space separated vertex list, the format `set_free_handicap` takes */
export function encodeVertices(points: GoPoint[], board_size: number): string {
    return points.map((pt) => encodeVertex(pt, board_size)).join(" ");
}
