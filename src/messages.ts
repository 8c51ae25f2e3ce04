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

import { _, interpolate } from "./translate";
import { GoColor, PlayerColor } from "./go/GoColor";
import type { GoSetupProblem } from "./go/GoError";
import type { GoGameHasEndedReason, GoMoveIllegalReason } from "./go/GoGame";

export type ParseMoveStringProblem = "invalid_format" | "invalid_color" | "invalid_vertex";

/** Why a load attempt failed, with the values its message needs */
export type LoadGameFailureDetail =
    | { message_id: "file_not_copyable"; path: string; reason: string }
    | { message_id: "not_a_valid_save_file"; reason: string }
    | { message_id: "engine_unavailable" }
    | { message_id: "query_failed"; command: string; reason: string }
    | { message_id: "board_size_undetermined" }
    | { message_id: "board_size_not_supported"; size: number }
    | { message_id: "invalid_komi"; komi: string }
    | { message_id: "invalid_handicap"; vertex: string }
    | { message_id: "invalid_setup_string"; problem: ParseMoveStringProblem; setup: string }
    | { message_id: "invalid_setup"; vertex: string; problem: GoSetupProblem }
    | { message_id: "invalid_setup_player"; player: string }
    | { message_id: "invalid_move_string"; problem: ParseMoveStringProblem; move: string }
    | {
          message_id: "wrong_color_to_move";
          move_number: number;
          color: PlayerColor;
          expected: PlayerColor;
      }
    | {
          message_id: "illegal_move";
          move_number: number;
          color: PlayerColor;
          vertex: string;
          reason: GoMoveIllegalReason;
      }
    | {
          message_id: "move_after_game_ended";
          move_number: number;
          color: PlayerColor;
          ended_reason: GoGameHasEndedReason;
      }
    | { message_id: "unexpected_error"; error: string };

export type LoadGameFailureMessageId = LoadGameFailureDetail["message_id"];

export function colorName(color: PlayerColor): string {
    return color === GoColor.BLACK ? _("Black") : _("White");
}

export function illegalReasonDescription(reason: GoMoveIllegalReason): string {
    switch (reason) {
        case "intersection_occupied":
            return _("The intersection is already occupied");
        case "suicide":
            return _("The move is suicidal");
        case "simple_ko":
            return _("The move retakes a ko");
        case "superko":
            return _("The move repeats an earlier board position");
        case "game_ended":
            return _("The game has already ended");
    }
}

export function gameHasEndedReasonDescription(reason: GoGameHasEndedReason): string {
    switch (reason) {
        case "two_passes":
            return _("by two pass moves");
        case "resigned":
            return _("by resignation");
    }
}

function parseMoveStringProblemDescription(problem: ParseMoveStringProblem): string {
    switch (problem) {
        case "invalid_format":
            return _("Move string has invalid format");
        case "invalid_color":
            return _("Move string contains unsupported player color");
        case "invalid_vertex":
            return _("Move string contains invalid intersection");
    }
}

function setupProblemDescription(problem: GoSetupProblem): string {
    switch (problem) {
        case "intersection_set_up_twice":
            return _("the intersection is set up more than once");
        case "intersection_has_handicap_stone":
            return _("the intersection already has a black handicap stone");
        case "no_liberties":
            return _("the stone has no liberties");
    }
}

export function formatLoadGameFailure(detail: LoadGameFailureDetail): string {
    switch (detail.message_id) {
        case "file_not_copyable":
            return interpolate(_("The game file {{path}} could not be copied: {{reason}}"), {
                path: detail.path,
                reason: detail.reason,
            });
        case "not_a_valid_save_file":
            return interpolate(
                _("The file is not a valid save file. The engine reported: {{reason}}"),
                { reason: detail.reason },
            );
        case "engine_unavailable":
            return _("The Go engine is not running.");
        case "query_failed":
            return interpolate(_("The engine failed to answer {{command}}: {{reason}}"), {
                command: detail.command,
                reason: detail.reason,
            });
        case "board_size_undetermined":
            return _("The board size could not be determined.");
        case "board_size_not_supported":
            return interpolate(_("The board size is not supported: {{size}}."), {
                size: detail.size,
            });
        case "invalid_komi":
            return interpolate(_("The komi is not a number: {{komi}}."), { komi: detail.komi });
        case "invalid_handicap":
            return interpolate(_("The handicap contains an invalid intersection: {{vertex}}."), {
                vertex: detail.vertex,
            });
        case "invalid_setup_string":
            return interpolate(_("Internal error: {{problem}}. Setup string = {{setup}}"), {
                problem: parseMoveStringProblemDescription(detail.problem),
                setup: detail.setup,
            });
        case "invalid_setup":
            return interpolate(
                _(
                    "Game contains an invalid board setup prior to the first move: intersection {{vertex}}, {{problem}}.",
                ),
                { vertex: detail.vertex, problem: setupProblemDescription(detail.problem) },
            );
        case "invalid_setup_player":
            return interpolate(
                _("Game sets up an invalid player to play the first move: {{player}}."),
                { player: detail.player },
            );
        case "invalid_move_string":
            return interpolate(_("Internal error: {{problem}}. Move string = {{move}}"), {
                problem: parseMoveStringProblemDescription(detail.problem),
                move: detail.move,
            });
        case "wrong_color_to_move":
            return interpolate(
                _(
                    "Game contains a move by the wrong player: Move {{move_number}}, played by {{color}}, but {{expected}} is to move.",
                ),
                {
                    move_number: detail.move_number,
                    color: colorName(detail.color),
                    expected: colorName(detail.expected),
                },
            );
        case "illegal_move":
            return interpolate(
                _(
                    "Game contains an illegal move: Move {{move_number}}, played by {{color}}, on intersection {{vertex}}. Reason: {{reason}}.",
                ),
                {
                    move_number: detail.move_number,
                    color: colorName(detail.color),
                    vertex: detail.vertex,
                    reason: illegalReasonDescription(detail.reason),
                },
            );
        case "move_after_game_ended":
            return interpolate(
                _(
                    "Game contains a move after the game has already ended ({{ended_reason}}): Move {{move_number}}, played by {{color}}.",
                ),
                {
                    ended_reason: gameHasEndedReasonDescription(detail.ended_reason),
                    move_number: detail.move_number,
                    color: colorName(detail.color),
                },
            );
        case "unexpected_error":
            return interpolate(
                _("An unexpected error occurred loading the game. Error: {{error}}"),
                { error: detail.error },
            );
    }
}
