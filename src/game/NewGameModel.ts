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

import { DEFAULT_BOARD_SIZE } from "../go/GoBoard";
import { GoGame, GoKoRule, GoScoringSystem } from "../go/GoGame";
import { GoGameType, GoPlayer, computerPlayer, humanPlayer } from "../go/GoPlayer";
import { pointsForHandicap } from "../go/GoUtilities";
import type { GtpEngineProfile } from "../gtp/GtpEngineProfile";

export interface NewGameConfig {
    board_size: number;
    /** Number of handicap stones, 0 or 2 and up */
    handicap: number;
    komi: number;
    game_type: GoGameType;
    /** Which side the computer takes in a computer vs. human game */
    computer_plays_white: boolean;
    ko_rule: GoKoRule;
    scoring_system: GoScoringSystem;
    human_player_name: string;
    computer_player_name: string;
    /** Settings for the computer player(s); the command's fallback profile when absent */
    computer_profile?: GtpEngineProfile;
}

export const DEFAULT_NEW_GAME_CONFIG: Readonly<NewGameConfig> = {
    board_size: DEFAULT_BOARD_SIZE,
    handicap: 0,
    komi: 6.5,
    game_type: "computer_vs_human",
    computer_plays_white: true,
    ko_rule: "simple",
    scoring_system: "area",
    human_player_name: "Human Player",
    computer_player_name: "Computer Player",
};

function playersFor(config: NewGameConfig): { black: GoPlayer; white: GoPlayer } {
    const human = () => humanPlayer(config.human_player_name);
    const computer = () => computerPlayer(config.computer_player_name, config.computer_profile);

    switch (config.game_type) {
        case "human_vs_human":
            return { black: human(), white: human() };
        case "computer_vs_computer":
            return { black: computer(), white: computer() };
        case "computer_vs_human":
            return config.computer_plays_white
                ? { black: human(), white: computer() }
                : { black: computer(), white: human() };
    }
}

/** A fresh local game, set up with handicap stones and komi as configured. */
export function createGame(config: NewGameConfig): GoGame {
    const { black, white } = playersFor(config);
    return new GoGame({
        board_size: config.board_size,
        komi: config.komi,
        handicap_points: pointsForHandicap(config.handicap, config.board_size),
        rules: { ko_rule: config.ko_rule, scoring_system: config.scoring_system },
        player_black: black,
        player_white: white,
    });
}

