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

import { PlayerColor, parseColor } from "../go/GoColor";
import type { GoBoard } from "../go/GoBoard";
import type { ParseMoveStringProblem } from "../messages";
import type { GoPoint } from "../util/coordinates";

/** One move of a `list_moves` answer */
export type MoveRecord =
    | { type: "play"; color: PlayerColor; point: GoPoint; vertex: string }
    | { type: "pass"; color: PlayerColor }
    | { type: "resign"; color: PlayerColor };

export type MoveRecordParseResult = MoveRecord | { problem: ParseMoveStringProblem };

/** Splits a move list like `"B C3, W G7\nB pass"` into its records */
export function splitMoveList(move_list: string): string[] {
    return move_list
        .split(/,|\r?\n/)
        .map((s) => s.trim())
        .filter((s) => s !== "");
}

/** Parses `"<color> <vertex|pass|resign>"` against the given board */
export function parseMoveRecord(move_string: string, board: GoBoard): MoveRecordParseResult {
    const parts = move_string.trim().split(/\s+/);
    if (parts.length !== 2) {
        return { problem: "invalid_format" };
    }

    const color = parseColor(parts[0]);
    if (color === undefined) {
        return { problem: "invalid_color" };
    }

    const what = parts[1].toLowerCase();
    if (what === "pass") {
        return { type: "pass", color };
    }
    if (what === "resign") {
        return { type: "resign", color };
    }

    const point = board.pointAtVertex(parts[1]);
    if (!point) {
        return { problem: "invalid_vertex" };
    }
    return { type: "play", color, point, vertex: board.vertexOf(point) };
}

/** One stone of a `list_setup` answer */
export interface SetupStoneRecord {
    color: PlayerColor;
    point: GoPoint;
    vertex: string;
}

/** Parses `"<color> <vertex>"`; setup entries have no pass or resign */
export function parseSetupStoneRecord(
    setup_string: string,
    board: GoBoard,
): SetupStoneRecord | { problem: ParseMoveStringProblem } {
    const record = parseMoveRecord(setup_string, board);
    if ("problem" in record) {
        return record;
    }
    if (record.type !== "play") {
        return { problem: "invalid_vertex" };
    }
    return { color: record.color, point: record.point, vertex: record.vertex };
}
