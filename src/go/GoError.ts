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

export type GoMoveErrorMessageId =
    | "stone_already_placed_here"
    | "illegal_self_capture"
    | "illegal_ko_move"
    | "illegal_board_repetition"
    | "game_has_ended"
    | "move_error"; // generic

export class GoError extends Error {
    constructor(message?: string) {
        super(message); // 'Error' breaks prototype chain here
        Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    }
}

/**
 * Thrown when a move is applied that the rules do not allow. Callers that
 * handle untrusted moves ask GoGame.isLegalMove() first.
 */
export class GoMoveError extends GoError {
    move_number: number;
    coords: string;
    message_id: GoMoveErrorMessageId;

    constructor(move_number: number, coords: string, message_id: GoMoveErrorMessageId) {
        super(`Move error on move number ${move_number} at ${coords}: ${message_id}`);

        this.move_number = move_number;
        this.coords = coords;
        this.message_id = message_id;
    }
}

export type GoSetupProblem =
    | "intersection_set_up_twice"
    | "intersection_has_handicap_stone"
    | "no_liberties";

/** Thrown when the stones set up before the first move do not form a valid position */
export class GoSetupError extends GoError {
    vertex: string;
    problem: GoSetupProblem;

    constructor(vertex: string, problem: GoSetupProblem) {
        super(`Invalid board setup at ${vertex}: ${problem}`);

        this.vertex = vertex;
        this.problem = problem;
    }
}
