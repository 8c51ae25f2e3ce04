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

import { GtpTransport } from "gtp-session";

/** Returns the raw answer for a command, e.g. `"= 6.5"` or `"? cannot load file"` */
export type FakeGtpHandler = (args: string[], command: string) => string;

/**
 * An in-process GTP engine. Commands are answered asynchronously from a
 * table of handlers keyed by verb; unknown verbs are answered with `=`.
 */
export class FakeGtpEngine extends GtpTransport {
    public commands: string[] = [];
    public handlers: { [verb: string]: FakeGtpHandler | string } = {};
    /** While set, answers are kept back until release() */
    public hold = false;

    private is_running = true;
    private write_buffer = "";
    private held: string[] = [];

    get running(): boolean {
        return this.is_running;
    }

    public write(data: string): void {
        if (!this.is_running) {
            throw new Error("FakeGtpEngine is not running");
        }
        this.write_buffer += data;

        let newline = this.write_buffer.indexOf("\n");
        while (newline >= 0) {
            const command = this.write_buffer.slice(0, newline);
            this.write_buffer = this.write_buffer.slice(newline + 1);
            this.commands.push(command);

            const answer = this.answer(command) + "\n\n";
            if (this.hold) {
                this.held.push(answer);
            } else {
                this.deliver(answer);
            }
            newline = this.write_buffer.indexOf("\n");
        }
    }

    public close(): void {
        this.stop(0);
    }

    /** Delivers the answers kept back while `hold` was set */
    public release(): void {
        this.hold = false;
        const held = this.held;
        this.held = [];
        for (const answer of held) {
            this.deliver(answer);
        }
    }

    /** Simulates the engine process going away */
    public stop(code: number | null = 1): void {
        if (!this.is_running) {
            return;
        }
        this.is_running = false;
        this.held = [];
        this.emit("exit", code);
    }

    /** The commands received so far, without the given verbs */
    public commandsExcept(...verbs: string[]): string[] {
        return this.commands.filter((c) => !verbs.includes(c.split(" ")[0]));
    }

    private answer(command: string): string {
        const [verb, ...args] = command.split(" ");
        const handler = this.handlers[verb];
        if (handler === undefined) {
            return "=";
        }
        return typeof handler === "string" ? handler : handler(args, command);
    }

    private deliver(answer: string): void {
        setImmediate(() => {
            if (this.is_running) {
                this.emit("data", answer);
            }
        });
    }
}

/** A `showboard` answer for an empty board, as Fuego prints it */
export function showboardAnswer(size: number): string {
    const letters = "ABCDEFGHJKLMNOPQRST".slice(0, size).split("").join(" ");
    const lines = ["=", `   ${letters}`];
    for (let row = size; row >= 1; --row) {
        const label = row < 10 ? ` ${row}` : `${row}`;
        lines.push(`${label} ${Array(size).fill(".").join(" ")} ${row}`);
    }
    lines.push(`   ${letters}`);
    return lines.join("\n");
}

export interface SavedGameScript {
    board_size: number;
    komi?: string;
    handicap?: string;
    setup?: string;
    setup_player?: string;
    moves?: string;
}

/** Makes `engine` answer the load queries as if it had loaded such a game */
export function scriptSavedGame(engine: FakeGtpEngine, saved: SavedGameScript): void {
    engine.handlers["loadsgf"] = "=";
    engine.handlers["showboard"] = showboardAnswer(saved.board_size);
    engine.handlers["get_komi"] = `= ${saved.komi ?? ""}`;
    engine.handlers["list_handicap"] = `= ${saved.handicap ?? ""}`;
    engine.handlers["list_setup"] = `= ${saved.setup ?? ""}`;
    engine.handlers["list_setup_player"] = `= ${saved.setup_player ?? ""}`;
    engine.handlers["list_moves"] = `= ${saved.moves ?? ""}`;
}

/** The verbs LoadGameCommand sends as part of applying an engine profile */
export const PROFILE_VERBS = ["uct_max_memory", "uct_param_search", "uct_param_player", "go_param"];
