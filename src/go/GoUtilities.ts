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

import type { GoPoint } from "../util/coordinates";

/**
 * Returns the star points for a fixed handicap, in the order the GTP
 * `fixed_handicap` command places them. A handicap of 0 yields no points;
 * 1 is not a handicap that places stones and is rejected.
 */
export function pointsForHandicap(handicap: number, board_size: number): GoPoint[] {
    if (handicap === 0) {
        return [];
    }
    const max = maxHandicap(board_size);
    if (!Number.isInteger(handicap) || handicap < 2 || handicap > max) {
        throw new Error(
            `Handicap ${handicap} is not possible on a ${board_size}x${board_size} board`,
        );
    }

    const edge = board_size >= 13 ? 3 : 2;
    const lo = edge;
    const hi = board_size - 1 - edge;
    const mid = (board_size - 1) / 2;

    /* x is the column from the left, y the row from the top */
    const lower_left = { x: lo, y: hi };
    const upper_right = { x: hi, y: lo };
    const upper_left = { x: lo, y: lo };
    const lower_right = { x: hi, y: hi };
    const center = { x: mid, y: mid };
    const mid_left = { x: lo, y: mid };
    const mid_right = { x: hi, y: mid };
    const mid_bottom = { x: mid, y: hi };
    const mid_top = { x: mid, y: lo };

    const corners = [lower_left, upper_right, upper_left, lower_right];
    switch (handicap) {
        case 2:
        case 3:
        case 4:
            return corners.slice(0, handicap);
        case 5:
            return [...corners, center];
        case 6:
            return [...corners, mid_left, mid_right];
        case 7:
            return [...corners, mid_left, mid_right, center];
        case 8:
            return [...corners, mid_left, mid_right, mid_bottom, mid_top];
        default:
            return [...corners, mid_left, mid_right, mid_bottom, mid_top, center];
    }
}

/** Largest fixed handicap for a board size; side star points need at least 9x9 */
export function maxHandicap(board_size: number): number {
    if (board_size < 7 || board_size % 2 === 0) {
        return 0;
    }
    return board_size >= 9 ? 9 : 4;
}
