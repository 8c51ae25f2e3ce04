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

import type { GoGame, GoKoRule, GoScoringSystem } from "../go/GoGame";
import { encodeVertices } from "../util/coordinates";
import type { GtpClient } from "../gtp/GtpClient";
import { GtpEngineProfile } from "../gtp/GtpEngineProfile";
import { sendRequired, setupComputerPlayer } from "../gtp/GtpUtilities";
import { ComputerPlayMoveCommand } from "./ComputerPlayMoveCommand";
import type { GameHandle } from "./GameHandle";
import { DEFAULT_NEW_GAME_CONFIG, NewGameConfig, createGame } from "./NewGameModel";

export interface NewGameOptions {
    config?: NewGameConfig;
    /** Use this game instead of creating one from `config` */
    game?: GoGame;
    /** Send clear_board, boardsize and the rule parameters. Default true */
    setup_gtp_board?: boolean;
    /** Send the handicap stones and komi. Default true */
    setup_gtp_handicap_and_komi?: boolean;
    /** Apply the computer player's engine profile. Default true */
    setup_computer_player?: boolean;
    /** Let the computer move if it has the first move. Default true */
    trigger_computer_player?: boolean;
    /** Profile for computer players that have none of their own */
    fallback_profile?: GtpEngineProfile;
}

export interface NewGameResult {
    game: GoGame;
    /**
     * Set when a computer move was triggered. Settles once the engine has
     * answered and the move has been played; the caller must handle a
     * rejection.
     */
    computer_move?: Promise<void>;
}

const GTP_KO_RULE: { [rule in GoKoRule]: string } = {
    simple: "simple",
    positional_superko: "pos_superko",
    situational_superko: "superko",
};

const GTP_JAPANESE_SCORING: { [system in GoScoringSystem]: number } = {
    area: 0,
    territory: 1,
};

/* Area scoring gives white an extra point of komi per handicap stone */
const GTP_EXTRA_HANDICAP_KOMI: { [system in GoScoringSystem]: number } = {
    area: 1,
    territory: 0,
};

/**
 * Starts a new game: installs a fully built game as the current game of
 * `handle`, then brings the engine into the same state. Every engine command
 * sent here, the computer player's profile included, is expected to succeed;
 * if one doesn't, GtpInternalConsistencyError is thrown and nothing else is
 * sent.
 */
export class NewGameCommand {
    public readonly options: NewGameOptions;
    private client: GtpClient;
    private handle: GameHandle;

    constructor(client: GtpClient, handle: GameHandle, options: NewGameOptions = {}) {
        this.client = client;
        this.handle = handle;
        this.options = options;
    }

    public async submit(): Promise<NewGameResult> {
        const opts = this.options;
        const game = opts.game ?? createGame(opts.config ?? DEFAULT_NEW_GAME_CONFIG);
        this.handle.replace(game);

        if (opts.setup_gtp_board ?? true) {
            await this.setupGtpBoard(game);
            await this.setupGtpRules(game);
        }
        if (opts.setup_gtp_handicap_and_komi ?? true) {
            await this.setupGtpHandicapAndKomi(game);
        }

        if (opts.setup_computer_player ?? true) {
            await setupComputerPlayer(
                this.client,
                game,
                opts.fallback_profile ?? new GtpEngineProfile(),
            );
        }

        const result: NewGameResult = { game };
        if ((opts.trigger_computer_player ?? true) && game.next_move_player_is_computer_player) {
            result.computer_move = new ComputerPlayMoveCommand(this.client, game).submit();
        }
        return result;
    }

    private async setupGtpBoard(game: GoGame): Promise<void> {
        await sendRequired(this.client, "clear_board");
        await sendRequired(this.client, `boardsize ${game.board.size}`);
    }

    private async setupGtpRules(game: GoGame): Promise<void> {
        const { ko_rule, scoring_system } = game.rules;
        await sendRequired(this.client, `go_param_rules ko_rule ${GTP_KO_RULE[ko_rule]}`);
        await sendRequired(
            this.client,
            `go_param_rules japanese_scoring ${GTP_JAPANESE_SCORING[scoring_system]}`,
        );
        await sendRequired(
            this.client,
            `go_param_rules extra_handicap_komi ${GTP_EXTRA_HANDICAP_KOMI[scoring_system]}`,
        );
    }

    private async setupGtpHandicapAndKomi(game: GoGame): Promise<void> {
        const handicap = game.handicap_points;
        if (handicap.length >= 2) {
            await sendRequired(
                this.client,
                `set_free_handicap ${encodeVertices(handicap, game.board.size)}`,
            );
        }
        await sendRequired(this.client, `komi ${game.komi.toFixed(1)}`);
    }
}
