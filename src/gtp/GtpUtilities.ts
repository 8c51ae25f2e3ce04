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

import type { GtpClient } from "./GtpClient";
import type { GtpEngineProfile } from "./GtpEngineProfile";
import { GtpInternalConsistencyError } from "./GtpError";
import type { GoGame } from "../go/GoGame";
import type { GoPlayer } from "../go/GoPlayer";

/**
 * Sends a setup command that the engine has no reason to refuse. A failure
 * answer throws GtpInternalConsistencyError.
 */
export async function sendRequired(client: GtpClient, command: string): Promise<void> {
    const response = await client.sendPromise(command);
    if (!response.status) {
        throw new GtpInternalConsistencyError(command, response);
    }
}

/*
 * Pondering is switched without waiting for the answer. Since the client
 * answers commands in order, anything submitted afterwards already sees the
 * engine in the requested state.
 */

function sendWithoutWaiting(client: GtpClient, command: string): void {
    client.send(command, (response, error) => {
        if (error) {
            console.warn(`"${command}" was not answered: ${error.message}`);
        } else if (response && !response.status) {
            console.warn(`"${command}" failed: ${response.parsed_response}`);
        }
    });
}

export function startPondering(client: GtpClient): void {
    sendWithoutWaiting(client, "uct_param_player ponder 1");
}

/** Stops the engine from thinking while it is not its turn */
export function stopPondering(client: GtpClient): void {
    sendWithoutWaiting(client, "uct_param_player ponder 0");
}

/** Switches pondering back to what the active profile wants */
export function restorePondering(client: GtpClient, active_profile?: GtpEngineProfile): void {
    if (!active_profile) {
        console.error(
            "restorePondering: unable to determine profile with computer player settings",
        );
        return;
    }
    if (active_profile.settings.pondering) {
        startPondering(client);
    } else {
        stopPondering(client);
    }
}

/**
 * The player whose profile configures the engine: none in a human vs.
 * human game, otherwise black if black is a computer, else white.
 */
export function playerProvidingActiveProfile(game: GoGame): GoPlayer | undefined {
    if (game.type === "human_vs_human") {
        return undefined;
    }
    return game.player_black.human ? game.player_white : game.player_black;
}

/**
 * Installs the computer player configuration for `game` and returns the
 * profile that was applied. A setting the engine refuses throws
 * GtpInternalConsistencyError.
 */
export async function setupComputerPlayer(
    client: GtpClient,
    game: GoGame,
    fallback_profile: GtpEngineProfile,
): Promise<GtpEngineProfile> {
    const profile = playerProvidingActiveProfile(game)?.profile ?? fallback_profile;
    await profile.applyProfile(client);
    return profile;
}
