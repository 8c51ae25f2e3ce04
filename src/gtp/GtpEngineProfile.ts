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
import { sendRequired, startPondering, stopPondering } from "./GtpUtilities";

export interface GtpEngineProfileSettings {
    name: string;
    /** Megabytes the search tree may use */
    max_memory: number;
    thread_count: number;
    pondering: boolean;
    /** Seconds */
    max_ponder_time: number;
    reuse_subtree: boolean;
    /** Seconds */
    max_thinking_time: number;
    max_games: number;
}

export const DEFAULT_ENGINE_PROFILE_SETTINGS: Readonly<GtpEngineProfileSettings> = {
    name: "Default",
    max_memory: 32,
    thread_count: 1,
    pondering: true,
    max_ponder_time: 300,
    reuse_subtree: true,
    max_thinking_time: 10,
    max_games: 10000,
};

/** The settings a computer player runs the engine with */
export class GtpEngineProfile {
    public readonly settings: GtpEngineProfileSettings;

    constructor(settings: Partial<GtpEngineProfileSettings> = {}) {
        this.settings = { ...DEFAULT_ENGINE_PROFILE_SETTINGS, ...settings };
    }

    /** The commands that install this profile, pondering excepted */
    public commands(): string[] {
        const s = this.settings;
        return [
            `uct_max_memory ${s.max_memory * 1000000}`,
            `uct_param_search number_threads ${s.thread_count}`,
            `uct_param_player reuse_subtree ${s.reuse_subtree ? 1 : 0}`,
            `uct_param_player max_ponder_time ${s.max_ponder_time}`,
            `go_param timelimit ${s.max_thinking_time}`,
            `uct_param_player max_games ${s.max_games}`,
        ];
    }

    /**
     * Sends this profile's settings to the engine. Resolves once the engine
     * has accepted all of them; a rejected setting rejects with
     * GtpInternalConsistencyError and nothing after it is sent.
     */
    public async applyProfile(client: GtpClient): Promise<void> {
        if (!client.options.quiet) {
            console.info(`Applying GTP engine profile "${this.settings.name}"`);
        }

        const [memory, threads, reuse, ...rest] = this.commands();
        await sendRequired(client, memory);
        await sendRequired(client, threads);
        await sendRequired(client, reuse);
        if (this.settings.pondering) {
            startPondering(client);
        } else {
            stopPondering(client);
        }
        for (const command of rest) {
            await sendRequired(client, command);
        }
    }
}
