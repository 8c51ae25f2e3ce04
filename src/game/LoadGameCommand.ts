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

import { EventEmitter } from "eventemitter3";
import * as path from "path";
import { setImmediate } from "timers/promises";
import { _ } from "../translate";
import { LoadGameFailureDetail, formatLoadGameFailure } from "../messages";
import { DEFAULT_BOARD_SIZE, GoBoard } from "../go/GoBoard";
import { GoColor, PlayerColor, parseColor } from "../go/GoColor";
import { GoSetupError } from "../go/GoError";
import type { GoGame } from "../go/GoGame";
import { decodeVertex, GoPoint } from "../util/coordinates";
import type { GtpClient } from "../gtp/GtpClient";
import { GtpEngineProfile } from "../gtp/GtpEngineProfile";
import { GtpEngineUnavailableError, GtpInternalConsistencyError } from "../gtp/GtpError";
import type { GtpResponse } from "../gtp/GtpResponse";
import { setupComputerPlayer, stopPondering } from "../gtp/GtpUtilities";
import { ComputerPlayMoveCommand } from "./ComputerPlayMoveCommand";
import { StagedFile, releaseStagedFile, stageFile } from "./FileStaging";
import type { GameHandle } from "./GameHandle";
import { parseMoveRecord, parseSetupStoneRecord, splitMoveList } from "./MoveRecord";
import { NewGameCommand } from "./NewGameCommand";
import { DEFAULT_NEW_GAME_CONFIG, NewGameConfig, createGame } from "./NewGameModel";

export type LoadGameStage =
    | "stage"
    | "engine_load"
    | "recover_board_size"
    | "recover_komi"
    | "recover_handicap"
    | "recover_setup"
    | "recover_setup_player"
    | "recover_moves"
    | "materialize"
    | "replay"
    | "complete";

/* Progress is reported once per fixed step, and at most this often while replaying */
export const MAX_REPLAY_PROGRESS_STEPS = 10;
const FIXED_PROGRESS_STEPS = 9;

export interface LoadGameOptions {
    /**
     * Where the game file is copied to before the engine loads it. Must be
     * the engine's working directory.
     */
    staging_directory: string;
    /** Reload a game that was in progress when the application stopped */
    restore_mode?: boolean;
    /** Name of the archived game, passed on with the "game.loaded" event */
    game_name?: string;
    /** Players and rules for the loaded game, and everything for the fallback game */
    config?: NewGameConfig;
    /** Profile for computer players that have none of their own */
    fallback_profile?: GtpEngineProfile;
}

export interface LoadGameCommandEvents {
    progress: (fraction: number, label: string) => void;
}

export type LoadGameResult =
    | {
          success: true;
          game: GoGame;
          /** Set when the computer is to move. See ComputerPlayMoveCommand */
          computer_move?: Promise<void>;
      }
    | {
          success: false;
          /** The default game that was started instead */
          game: GoGame;
          stage: LoadGameStage;
          failure: LoadGameFailureDetail;
          title: string;
          message: string;
      };

/** Ends a load attempt. Only ever seen by the failure handler of LoadGameCommand */
export class LoadGameFailure extends Error {
    public readonly stage: LoadGameStage;
    public readonly detail: LoadGameFailureDetail;

    constructor(stage: LoadGameStage, detail: LoadGameFailureDetail) {
        super(formatLoadGameFailure(detail));
        Object.setPrototypeOf(this, new.target.prototype);
        this.name = new.target.name;
        this.stage = stage;
        this.detail = detail;
    }
}

/*
 * Everything one load attempt finds out. Each step fills in its own field
 * and reads only fields of earlier steps.
 */
interface LoadSessionState {
    stage: LoadGameStage;
    staged?: StagedFile;
    board_size?: number;
    komi?: string;
    handicap?: string;
    setup?: string;
    setup_player?: string;
    moves?: string;
    did_fail: boolean;
}

function produced<T>(value: T | undefined, field: string): T {
    if (value === undefined) {
        throw new Error(`Load session has no ${field} yet`);
    }
    return value;
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/**
 * Loads a game from an SGF file. The engine does the parsing: the file is
 * loaded with `loadsgf`, then board size, komi, handicap, setup stones, the
 * player to move first and the moves are asked back one after the other,
 * and the local game is built from the answers and replayed move by move.
 *
 * `submit()` never rejects because the file is bad. When any step fails a
 * default game is started instead and the result carries a title and
 * message for the user. It does reject on GtpInternalConsistencyError,
 * when the engine refuses the computer player's profile or the setup of
 * the default game.
 */
export class LoadGameCommand extends EventEmitter<LoadGameCommandEvents> {
    public readonly file_path: string;
    public readonly options: LoadGameOptions;

    private client: GtpClient;
    private handle: GameHandle;
    private progress = 0;

    constructor(
        client: GtpClient,
        handle: GameHandle,
        file_path: string,
        options: LoadGameOptions,
    ) {
        super();
        this.client = client;
        this.handle = handle;
        this.file_path = file_path;
        this.options = options;
    }

    /** Loads `<archive_directory>/<game_name>.sgf` */
    public static fromArchive(
        client: GtpClient,
        handle: GameHandle,
        archive_directory: string,
        game_name: string,
        options: LoadGameOptions,
    ): LoadGameCommand {
        return new LoadGameCommand(
            client,
            handle,
            path.join(archive_directory, `${game_name}.sgf`),
            { ...options, game_name },
        );
    }

    get config(): NewGameConfig {
        return this.options.config ?? DEFAULT_NEW_GAME_CONFIG;
    }

    get progress_label(): string {
        return this.options.restore_mode ? _("Restoring game...") : _("Loading game...");
    }

    public async submit(): Promise<LoadGameResult> {
        const session: LoadSessionState = { stage: "stage", did_fail: false };
        this.progress = 0;
        this.reportProgress();

        try {
            await this.step(session, "stage", () => this.stageGameFile(session));
            await this.step(session, "engine_load", () => this.loadIntoEngine(session));
            await this.step(session, "recover_board_size", () => this.recoverBoardSize(session));
            await this.step(session, "recover_komi", () => this.recoverKomi(session));
            await this.step(session, "recover_handicap", () => this.recoverHandicap(session));
            await this.step(session, "recover_setup", () => this.recoverSetup(session));
            await this.step(session, "recover_setup_player", () =>
                this.recoverSetupPlayer(session),
            );
            await this.step(session, "recover_moves", () => this.recoverMoves(session));
            const game = await this.step(session, "materialize", () => this.materialize(session));

            session.stage = "replay";
            await this.replay(session, game);

            session.stage = "complete";
            const { computer_move } = await this.complete(game);
            this.progress = 1;
            this.reportProgress();
            return { success: true, game, computer_move };
        } catch (e) {
            return await this.handleLoadFailure(session, e);
        } finally {
            await this.releaseStagingQuietly(session);
        }
    }

    private async step<T>(
        session: LoadSessionState,
        stage: LoadGameStage,
        run: () => Promise<T>,
    ): Promise<T> {
        session.stage = stage;
        const result = await run();
        this.increaseProgress(1 / (FIXED_PROGRESS_STEPS + MAX_REPLAY_PROGRESS_STEPS));
        return result;
    }

    private async stageGameFile(session: LoadSessionState): Promise<void> {
        try {
            session.staged = await stageFile(this.file_path, this.options.staging_directory);
        } catch (e) {
            throw new LoadGameFailure("stage", {
                message_id: "file_not_copyable",
                path: this.file_path,
                reason: errorMessage(e),
            });
        }
    }

    private async loadIntoEngine(session: LoadSessionState): Promise<void> {
        const staged = produced(session.staged, "staged file");

        stopPondering(this.client);
        const response = await this.client.sendPromise(`loadsgf ${staged.name}`);
        if (!response.status) {
            throw new LoadGameFailure("engine_load", {
                message_id: "not_a_valid_save_file",
                reason: response.parsed_response,
            });
        }
        await releaseStagedFile(staged);
    }

    private async recoverBoardSize(session: LoadSessionState): Promise<void> {
        const response = await this.query("recover_board_size", "showboard");

        /* One line per board row, each starting with the row number */
        const size = response.lines.filter((line) => /^\s*\d+\s/.test(line)).length;
        if (size === 0) {
            throw new LoadGameFailure("recover_board_size", {
                message_id: "board_size_undetermined",
            });
        }
        if (!GoBoard.isSupportedSize(size)) {
            throw new LoadGameFailure("recover_board_size", {
                message_id: "board_size_not_supported",
                size,
            });
        }
        session.board_size = size;
    }

    private async recoverKomi(session: LoadSessionState): Promise<void> {
        session.komi = (await this.query("recover_komi", "get_komi")).parsed_response;
    }

    private async recoverHandicap(session: LoadSessionState): Promise<void> {
        session.handicap = (await this.query("recover_handicap", "list_handicap")).parsed_response;
    }

    private async recoverSetup(session: LoadSessionState): Promise<void> {
        session.setup = (await this.query("recover_setup", "list_setup")).parsed_response;
    }

    private async recoverSetupPlayer(session: LoadSessionState): Promise<void> {
        session.setup_player = (
            await this.query("recover_setup_player", "list_setup_player")
        ).parsed_response;
    }

    private async recoverMoves(session: LoadSessionState): Promise<void> {
        session.moves = (await this.query("recover_moves", "list_moves")).parsed_response;
    }

    private async query(stage: LoadGameStage, command: string): Promise<GtpResponse> {
        const response = await this.client.sendPromise(command);
        if (!response.status) {
            throw new LoadGameFailure(stage, {
                message_id: "query_failed",
                command,
                reason: response.parsed_response,
            });
        }
        return response;
    }

    /**
     * Builds the local game from what the engine told us and makes it the
     * current game. The engine already has board, handicap, setup and komi
     * from the file, so nothing is sent to it.
     */
    private async materialize(session: LoadSessionState): Promise<GoGame> {
        const board_size = produced(session.board_size, "board size");

        const komi_text = produced(session.komi, "komi");
        if (komi_text !== "" && !/^[+-]?(\d+\.?\d*|\.\d+)$/.test(komi_text)) {
            throw new LoadGameFailure("materialize", {
                message_id: "invalid_komi",
                komi: komi_text,
            });
        }
        const komi = komi_text === "" ? 0 : Number(komi_text);

        const handicap_points: GoPoint[] = [];
        for (const vertex of produced(session.handicap, "handicap").split(/\s+/)) {
            if (vertex === "") {
                continue;
            }
            const point = decodeVertex(vertex, board_size);
            if (!point) {
                throw new LoadGameFailure("materialize", {
                    message_id: "invalid_handicap",
                    vertex,
                });
            }
            handicap_points.push(point);
        }

        const game = createGame({ ...this.config, board_size, handicap: 0, komi });
        game.handicap_points = handicap_points;
        this.setupStones(game, produced(session.setup, "setup"));
        game.setup_first_move_color = this.setupPlayer(
            produced(session.setup_player, "setup player"),
        );

        const result = await new NewGameCommand(this.client, this.handle, {
            game,
            setup_gtp_board: false,
            setup_gtp_handicap_and_komi: false,
            setup_computer_player: false,
            trigger_computer_player: false,
        }).submit();
        return result.game;
    }

    private setupStones(game: GoGame, setup: string): void {
        const black: GoPoint[] = [];
        const white: GoPoint[] = [];
        for (const setup_string of splitMoveList(setup)) {
            const record = parseSetupStoneRecord(setup_string, game.board);
            if ("problem" in record) {
                throw new LoadGameFailure("materialize", {
                    message_id: "invalid_setup_string",
                    problem: record.problem,
                    setup: setup_string,
                });
            }
            (record.color === GoColor.BLACK ? black : white).push(record.point);
        }

        try {
            game.setupStones(black, white);
        } catch (e) {
            if (e instanceof GoSetupError) {
                throw new LoadGameFailure("materialize", {
                    message_id: "invalid_setup",
                    vertex: e.vertex,
                    problem: e.problem,
                });
            }
            throw e;
        }
    }

    /* An empty answer means the usual order: white first with handicap, black otherwise */
    private setupPlayer(setup_player: string): PlayerColor | undefined {
        if (setup_player === "") {
            return undefined;
        }
        const color = parseColor(setup_player);
        if (color === undefined) {
            throw new LoadGameFailure("materialize", {
                message_id: "invalid_setup_player",
                player: setup_player,
            });
        }
        return color;
    }

    /**
     * Replays the recovered moves on `game`. The first move that is by the
     * wrong player or illegal ends the load; no moves are skipped.
     */
    private async replay(session: LoadSessionState, game: GoGame): Promise<void> {
        const move_strings = splitMoveList(produced(session.moves, "moves"));
        const progress_steps = Math.min(move_strings.length, MAX_REPLAY_PROGRESS_STEPS);
        if (progress_steps === 0) {
            return;
        }
        const step_increase = (1 - this.progress) / progress_steps;

        let steps_done = 0;
        for (let i = 0; i < move_strings.length; ++i) {
            this.replayMove(game, move_strings[i], i + 1);

            const steps_reached = Math.floor(((i + 1) * progress_steps) / move_strings.length);
            if (steps_reached > steps_done) {
                steps_done = steps_reached;
                this.increaseProgress(step_increase);
                await setImmediate();
            }
        }
    }

    private replayMove(game: GoGame, move_string: string, move_number: number): void {
        const record = parseMoveRecord(move_string, game.board);
        if ("problem" in record) {
            throw new LoadGameFailure("replay", {
                message_id: "invalid_move_string",
                problem: record.problem,
                move: move_string,
            });
        }

        const expected = game.currentColorToMove();
        if (record.color !== expected) {
            throw new LoadGameFailure("replay", {
                message_id: "wrong_color_to_move",
                move_number,
                color: record.color,
                expected,
            });
        }

        if (game.state === "ended") {
            const ended_reason = game.reason_ended ?? "resigned";
            if (record.type === "resign" || ended_reason === "resigned") {
                throw new LoadGameFailure("replay", {
                    message_id: "move_after_game_ended",
                    move_number,
                    color: record.color,
                    ended_reason,
                });
            }
            // The engine lets play continue after two passes
            game.revertStateFromEndedToInProgress();
        }

        try {
            switch (record.type) {
                case "pass":
                    game.pass();
                    break;
                case "resign":
                    game.resign();
                    break;
                case "play": {
                    const legality = game.isLegalMove(record.point, record.color);
                    if (!legality.legal) {
                        throw new LoadGameFailure("replay", {
                            message_id: "illegal_move",
                            move_number,
                            color: record.color,
                            vertex: record.vertex,
                            reason: legality.reason,
                        });
                    }
                    game.play(record.point);
                    break;
                }
            }
        } catch (e) {
            if (e instanceof LoadGameFailure) {
                throw e;
            }
            throw new LoadGameFailure("replay", {
                message_id: "unexpected_error",
                error: errorMessage(e),
            });
        }
    }

    /*
     * The computer player is configured before anyone hears about the game,
     * so listeners of "game.loaded" only ever see a fully set up game.
     */
    private async complete(game: GoGame): Promise<{ computer_move?: Promise<void> }> {
        await setupComputerPlayer(
            this.client,
            game,
            this.options.fallback_profile ?? new GtpEngineProfile(),
        );
        this.handle.notifyLoaded(game, this.options.game_name);

        if (!game.next_move_player_is_computer_player) {
            return {};
        }
        if (this.options.restore_mode) {
            // A restored game waits for the user, computer vs. computer games are paused
            if (game.type === "computer_vs_computer") {
                game.pause();
            }
            return {};
        }
        return { computer_move: new ComputerPlayMoveCommand(this.client, game).submit() };
    }

    private async handleLoadFailure(
        session: LoadSessionState,
        error: unknown,
    ): Promise<LoadGameResult> {
        if (session.did_fail || error instanceof GtpInternalConsistencyError) {
            throw error;
        }
        session.did_fail = true;

        let failure: LoadGameFailure;
        if (error instanceof LoadGameFailure) {
            failure = error;
        } else if (error instanceof GtpEngineUnavailableError) {
            failure = new LoadGameFailure(session.stage, { message_id: "engine_unavailable" });
        } else {
            failure = new LoadGameFailure(session.stage, {
                message_id: "unexpected_error",
                error: errorMessage(error),
            });
        }

        await this.releaseStagingQuietly(session);
        const game = await this.startDefaultGame();

        const title = _("Failed to load game");
        console.error(`${title} (${this.file_path}, ${failure.stage}): ${failure.message}`);
        return {
            success: false,
            game,
            stage: failure.stage,
            failure: failure.detail,
            title,
            message: failure.message,
        };
    }

    /*
     * The game to continue with after a failed load. The engine is reset to
     * match if it is still running.
     */
    private async startDefaultGame(): Promise<GoGame> {
        if (this.client.running) {
            try {
                return await this.newDefaultGame(true);
            } catch (e) {
                if (!(e instanceof GtpEngineUnavailableError)) {
                    throw e;
                }
                console.warn("GTP engine went away while setting up the default game", e);
            }
        }
        return await this.newDefaultGame(false);
    }

    private async newDefaultGame(setup_engine: boolean): Promise<GoGame> {
        const result = await new NewGameCommand(this.client, this.handle, {
            config: { ...this.config, board_size: DEFAULT_BOARD_SIZE },
            setup_gtp_board: setup_engine,
            setup_gtp_handicap_and_komi: setup_engine,
            setup_computer_player: false,
            trigger_computer_player: false,
        }).submit();
        return result.game;
    }

    private async releaseStagingQuietly(session: LoadSessionState): Promise<void> {
        if (!session.staged) {
            return;
        }
        try {
            await releaseStagedFile(session.staged);
        } catch (e) {
            console.warn(`Unable to remove staged game file ${session.staged.path}`, e);
        }
    }

    private increaseProgress(amount: number): void {
        this.progress = Math.min(1, this.progress + amount);
        this.reportProgress();
    }

    private reportProgress(): void {
        try {
            this.emit("progress", this.progress, this.progress_label);
        } catch (e) {
            console.error("LoadGameCommand progress listener error", e);
        }
    }
}
