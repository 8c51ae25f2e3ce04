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

import { GoBoard, DEFAULT_BOARD_SIZE } from "./GoBoard";
import { GoColor, PlayerColor, opponentOf } from "./GoColor";
import { GoMoveError, GoMoveErrorMessageId, GoSetupError } from "./GoError";
import { GoGameType, GoPlayer, gameTypeOf, humanPlayer } from "./GoPlayer";
import type { GoPoint } from "../util/coordinates";

export type GoGameState = "in_progress" | "paused" | "ended";
export type GoGameHasEndedReason = "two_passes" | "resigned";
export type GoKoRule = "simple" | "positional_superko" | "situational_superko";
export type GoScoringSystem = "area" | "territory";

export interface GoGameRules {
    ko_rule: GoKoRule;
    scoring_system: GoScoringSystem;
}

export type GoMoveIllegalReason =
    | "intersection_occupied"
    | "suicide"
    | "simple_ko"
    | "superko"
    | "game_ended";

export type GoMoveLegality =
    | { legal: true; captures: number }
    | { legal: false; reason: GoMoveIllegalReason };

export type GoMove =
    | {
          type: "play";
          color: PlayerColor;
          move_number: number;
          point: GoPoint;
          captured: GoPoint[];
      }
    | {
          type: "pass";
          color: PlayerColor;
          move_number: number;
      };

export interface GoGameConfig {
    board_size?: number;
    komi?: number;
    handicap_points?: GoPoint[];
    rules?: Partial<GoGameRules>;
    player_black?: GoPlayer;
    player_white?: GoPlayer;
}

interface PositionRecord {
    key: string;
    color_to_move: PlayerColor;
}

interface PlacementResult {
    board: GoBoard;
    captured: GoPoint[];
    key: string;
}

const ILLEGAL_REASON_TO_MESSAGE_ID: { [reason in GoMoveIllegalReason]: GoMoveErrorMessageId } = {
    intersection_occupied: "stone_already_placed_here",
    suicide: "illegal_self_capture",
    simple_ko: "illegal_ko_move",
    superko: "illegal_board_repetition",
    game_ended: "game_has_ended",
};

/**
 * The local game record and rules engine: board, komi, handicap, players,
 * the moves played so far and whose turn it is.
 */
export class GoGame {
    public board: GoBoard;
    public komi: number;
    public rules: GoGameRules;
    public player_black: GoPlayer;
    public player_white: GoPlayer;
    public moves: GoMove[] = [];
    public state: GoGameState = "in_progress";
    public reason_ended?: GoGameHasEndedReason;
    public resigned_color?: PlayerColor;
    public next_move_color: PlayerColor = GoColor.BLACK;
    /** true while a computer move has been requested and not yet applied */
    public computer_thinks: boolean = false;

    private _handicap_points: GoPoint[] = [];
    private _black_setup_points: GoPoint[] = [];
    private _white_setup_points: GoPoint[] = [];
    private _setup_first_move_color?: PlayerColor;
    private history: PositionRecord[] = [];

    constructor(config: GoGameConfig = {}) {
        this.board = new GoBoard({ size: config.board_size ?? DEFAULT_BOARD_SIZE });
        this.komi = config.komi ?? 0;
        this.rules = {
            ko_rule: config.rules?.ko_rule ?? "simple",
            scoring_system: config.rules?.scoring_system ?? "area",
        };
        this.player_black = config.player_black ?? humanPlayer("Black");
        this.player_white = config.player_white ?? humanPlayer("White");
        this.handicap_points = config.handicap_points ?? [];
    }

    public get type(): GoGameType {
        return gameTypeOf(this.player_black, this.player_white);
    }

    public get handicap_points(): GoPoint[] {
        return this._handicap_points.slice();
    }

    /**
     * Places black stones on the handicap points, replacing any previous
     * handicap. White moves first in a handicap game. Only possible before
     * the first move, and before any setup stones are placed.
     */
    public set handicap_points(points: GoPoint[]) {
        this.assertBeforeFirstMove("Handicap");
        if (this._black_setup_points.length > 0 || this._white_setup_points.length > 0) {
            throw new Error("Handicap must be set up before the setup stones");
        }
        for (const pt of this._handicap_points) {
            this.board.set(pt, GoColor.EMPTY);
        }
        for (const pt of points) {
            if (!this.board.isOnBoard(pt)) {
                throw new Error(`Handicap point ${pt.x},${pt.y} is not on the board`);
            }
            this.board.set(pt, GoColor.BLACK);
        }
        this._handicap_points = points.map((pt) => ({ x: pt.x, y: pt.y }));
        this.resetStartingPosition();
    }

    public get black_setup_points(): GoPoint[] {
        return this._black_setup_points.slice();
    }

    public get white_setup_points(): GoPoint[] {
        return this._white_setup_points.slice();
    }

    /**
     * Places the stones a game record sets up before the first move,
     * replacing any previous setup. Handicap stones stay where they are.
     * Throws GoSetupError and leaves the board unchanged if the setup is not
     * a valid position.
     */
    public setupStones(black: GoPoint[], white: GoPoint[]): void {
        this.assertBeforeFirstMove("Setup stones");

        const board = this.board.cloneBoard();
        for (const pt of [...this._black_setup_points, ...this._white_setup_points]) {
            board.set(pt, GoColor.EMPTY);
        }

        const placed: GoPoint[] = [];
        const place = (pt: GoPoint, color: PlayerColor): void => {
            if (!board.isOnBoard(pt)) {
                throw new Error(`Setup point ${pt.x},${pt.y} is not on the board`);
            }
            if (placed.some((other) => other.x === pt.x && other.y === pt.y)) {
                throw new GoSetupError(board.vertexOf(pt), "intersection_set_up_twice");
            }
            if (board.get(pt) !== GoColor.EMPTY) {
                throw new GoSetupError(board.vertexOf(pt), "intersection_has_handicap_stone");
            }
            board.set(pt, color);
            placed.push({ x: pt.x, y: pt.y });
        };
        black.forEach((pt) => place(pt, GoColor.BLACK));
        white.forEach((pt) => place(pt, GoColor.WHITE));

        for (const pt of placed) {
            if (board.countLiberties(board.getStoneString(pt.x, pt.y)) === 0) {
                throw new GoSetupError(board.vertexOf(pt), "no_liberties");
            }
        }

        this.board = board;
        this._black_setup_points = black.map((pt) => ({ x: pt.x, y: pt.y }));
        this._white_setup_points = white.map((pt) => ({ x: pt.x, y: pt.y }));
        this.resetStartingPosition();
    }

    public get setup_first_move_color(): PlayerColor | undefined {
        return this._setup_first_move_color;
    }

    /**
     * The player a game record names to play first. When unset, white
     * moves first in a handicap game and black otherwise.
     */
    public set setup_first_move_color(color: PlayerColor | undefined) {
        this.assertBeforeFirstMove("The first player");
        this._setup_first_move_color = color;
        this.resetStartingPosition();
    }

    public get last_move(): GoMove | undefined {
        return this.moves[this.moves.length - 1];
    }

    public currentColorToMove(): PlayerColor {
        return this.next_move_color;
    }

    public playerOf(color: PlayerColor): GoPlayer {
        return color === GoColor.BLACK ? this.player_black : this.player_white;
    }

    public get current_player(): GoPlayer {
        return this.playerOf(this.next_move_color);
    }

    public isComputerPlayersTurn(): boolean {
        return !this.current_player.human;
    }

    /** true if the game is still going and the player to move is a computer */
    public get next_move_player_is_computer_player(): boolean {
        return this.state === "in_progress" && this.isComputerPlayersTurn();
    }

    /** Checks whether `color` may play at `point` without changing anything. */
    public isLegalMove(point: GoPoint, color: PlayerColor = this.next_move_color): GoMoveLegality {
        if (this.state === "ended") {
            return { legal: false, reason: "game_ended" };
        }
        if (!this.board.isOnBoard(point)) {
            throw new Error(`Point ${point.x},${point.y} is not on the board`);
        }
        const result = this.tryPlace(point, color);
        if ("reason" in result) {
            return { legal: false, reason: result.reason };
        }
        return { legal: true, captures: result.captured.length };
    }

    /** Plays a stone for the color to move. Throws GoMoveError if the move is illegal. */
    public play(point: GoPoint): GoMove {
        const color = this.next_move_color;
        const move_number = this.moves.length + 1;
        if (this.state === "ended") {
            throw new GoMoveError(move_number, this.board.vertexOf(point), "game_has_ended");
        }
        if (!this.board.isOnBoard(point)) {
            throw new GoMoveError(move_number, `${point.x},${point.y}`, "move_error");
        }

        const result = this.tryPlace(point, color);
        if ("reason" in result) {
            throw new GoMoveError(
                move_number,
                this.board.vertexOf(point),
                ILLEGAL_REASON_TO_MESSAGE_ID[result.reason],
            );
        }

        this.board = result.board;
        const move: GoMove = {
            type: "play",
            color,
            move_number,
            point: { x: point.x, y: point.y },
            captured: result.captured,
        };
        this.recordMove(move, result.key);
        return move;
    }

    /** Passes for the color to move. Two passes in a row end the game. */
    public pass(): GoMove {
        const color = this.next_move_color;
        const move_number = this.moves.length + 1;
        if (this.state === "ended") {
            throw new GoMoveError(move_number, "pass", "game_has_ended");
        }

        const previous = this.last_move;
        const move: GoMove = { type: "pass", color, move_number };
        this.recordMove(move, this.board.positionKey());

        if (previous?.type === "pass") {
            this.state = "ended";
            this.reason_ended = "two_passes";
        }
        return move;
    }

    /** The color to move resigns, ending the game */
    public resign(): void {
        if (this.state === "ended") {
            throw new GoMoveError(this.moves.length + 1, "resign", "game_has_ended");
        }
        this.resigned_color = this.next_move_color;
        this.state = "ended";
        this.reason_ended = "resigned";
    }

    /**
     * Continues a game that was ended by passing. A game that ended by
     * resignation cannot be continued.
     */
    public revertStateFromEndedToInProgress(): void {
        if (this.state !== "ended" || this.reason_ended !== "two_passes") {
            throw new Error(`Cannot revert game state "${this.state}" to in progress`);
        }
        this.state = "in_progress";
        this.reason_ended = undefined;
    }

    /** Pauses a computer vs. computer game so that neither side plays on its own */
    public pause(): void {
        if (this.type !== "computer_vs_computer") {
            throw new Error("Only computer vs. computer games can be paused");
        }
        if (this.state === "in_progress") {
            this.state = "paused";
        }
    }

    public resume(): void {
        if (this.state === "paused") {
            this.state = "in_progress";
        }
    }

    private assertBeforeFirstMove(what: string): void {
        if (this.moves.length > 0) {
            throw new Error(`${what} can only be set up before the first move`);
        }
    }

    private resetStartingPosition(): void {
        this.next_move_color =
            this._setup_first_move_color ??
            (this._handicap_points.length > 0 ? GoColor.WHITE : GoColor.BLACK);
        this.history = [{ key: this.board.positionKey(), color_to_move: this.next_move_color }];
    }

    private recordMove(move: GoMove, key: string): void {
        this.moves.push(move);
        this.next_move_color = opponentOf(move.color);
        this.history.push({ key, color_to_move: this.next_move_color });
    }

    private tryPlace(
        point: GoPoint,
        color: PlayerColor,
    ): PlacementResult | { reason: GoMoveIllegalReason } {
        if (this.board.get(point) !== GoColor.EMPTY) {
            return { reason: "intersection_occupied" };
        }

        const board = this.board.cloneBoard();
        board.set(point, color);

        const captured: GoPoint[] = [];
        const player_string = board.getStoneString(point.x, point.y);
        for (const neighbor of board.getNeighboringStoneStrings(player_string)) {
            if (board.get(neighbor[0]) !== color && board.countLiberties(neighbor) === 0) {
                captured.push(...neighbor);
                board.captureStoneString(neighbor);
            }
        }

        if (captured.length === 0 && board.countLiberties(player_string) === 0) {
            return { reason: "suicide" };
        }

        const key = board.positionKey();
        const color_to_move = opponentOf(color);
        switch (this.rules.ko_rule) {
            case "simple": {
                const before_last = this.history[this.history.length - 2];
                if (before_last && before_last.key === key) {
                    return { reason: "simple_ko" };
                }
                break;
            }
            case "positional_superko":
                if (this.history.some((h) => h.key === key)) {
                    return { reason: "superko" };
                }
                break;
            case "situational_superko":
                if (this.history.some((h) => h.key === key && h.color_to_move === color_to_move)) {
                    return { reason: "superko" };
                }
                break;
        }

        return { board, captured, key };
    }
}
