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

import type { GtpEngineProfile } from "../gtp/GtpEngineProfile";

export interface GoPlayer {
    name: string;
    human: boolean;
    /** Computer player settings; the fallback profile is used when absent */
    profile?: GtpEngineProfile;
}

export type GoGameType = "human_vs_human" | "computer_vs_human" | "computer_vs_computer";

export function humanPlayer(name: string): GoPlayer {
    return { name, human: true };
}

export function computerPlayer(name: string, profile?: GtpEngineProfile): GoPlayer {
    return { name, human: false, profile };
}

/** Derives the game type from who is playing */
export function gameTypeOf(black: GoPlayer, white: GoPlayer): GoGameType {
    if (black.human && white.human) {
        return "human_vs_human";
    }
    if (!black.human && !white.human) {
        return "computer_vs_computer";
    }
    return "computer_vs_human";
}
