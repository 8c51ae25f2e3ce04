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

let catalog: Partial<GtpSessionStrings> = {};
let debug_mode = false;

export interface GtpSessionStrings {
    "Black": string;
    "White": string;
    "Loading game...": string;
    "Restoring game...": string;
    "Failed to load game": string;
    "The game file {{path}} could not be copied: {{reason}}": string;
    "The file is not a valid save file. The engine reported: {{reason}}": string;
    "The Go engine is not running.": string;
    "The engine failed to answer {{command}}: {{reason}}": string;
    "The board size could not be determined.": string;
    "The board size is not supported: {{size}}.": string;
    "The komi is not a number: {{komi}}.": string;
    "The handicap contains an invalid intersection: {{vertex}}.": string;
    "Move string has invalid format": string;
    "Move string contains unsupported player color": string;
    "Move string contains invalid intersection": string;
    "Internal error: {{problem}}. Move string = {{move}}": string;
    "Internal error: {{problem}}. Setup string = {{setup}}": string;
    "Game contains an invalid board setup prior to the first move: intersection {{vertex}}, {{problem}}.": string;
    "Game sets up an invalid player to play the first move: {{player}}.": string;
    "the intersection is set up more than once": string;
    "the intersection already has a black handicap stone": string;
    "the stone has no liberties": string;
    "Game contains a move by the wrong player: Move {{move_number}}, played by {{color}}, but {{expected}} is to move.": string;
    "Game contains an illegal move: Move {{move_number}}, played by {{color}}, on intersection {{vertex}}. Reason: {{reason}}.": string;
    "Game contains a move after the game has already ended ({{ended_reason}}): Move {{move_number}}, played by {{color}}.": string;
    "An unexpected error occurred loading the game. Error: {{error}}": string;
    "by two pass moves": string;
    "by resignation": string;
    "The intersection is already occupied": string;
    "The move is suicidal": string;
    "The move retakes a ko": string;
    "The move repeats an earlier board position": string;
    "The game has already ended": string;
}

export function setGtpSessionTranslations(
    _catalog: Partial<GtpSessionStrings>,
    _debug_mode: boolean = false,
): void {
    catalog = _catalog;
    debug_mode = _debug_mode;
}

export type InterpolationParameters =
    | string
    | number
    | Array<string | number>
    | { [key: string]: string | number };

export function interpolate(str: string, params: InterpolationParameters): string {
    if (Array.isArray(params)) {
        let idx = 0;
        return str.replace(/%[sd]/g, () => {
            if (idx >= params.length) {
                throw new Error(`Missing array index ${idx} for string: ${str}`);
            }
            return String(params[idx++]);
        });
    }
    if (typeof params === "object") {
        return str.replace(/{{([^}]+)}}/g, (_match, key: string) => {
            if (!(key in params)) {
                throw new Error(`Missing interpolation key: ${key} for string: ${str}`);
            }
            return String(params[key]);
        });
    }
    return str.replace(/%[sd]/g, () => String(params));
}

export function _(msgid: keyof GtpSessionStrings): string {
    const translated = catalog[msgid];
    if (translated !== undefined) {
        return translated;
    }
    return debug_mode ? `[${msgid}]` : msgid;
}
