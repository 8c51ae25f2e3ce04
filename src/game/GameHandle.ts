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
import type { GoGame } from "../go/GoGame";

export interface GameHandleEvents {
    /* The current game, if any, is about to be replaced */
    "game.will_replace": (old_game: GoGame | undefined) => void;
    /* `new_game` is now the current game */
    "game.replaced": (new_game: GoGame, old_game: GoGame | undefined) => void;
    /* A game has been loaded and replayed. `game_name` is set for archived games */
    "game.loaded": (game: GoGame, game_name?: string) => void;
}

/**
 * Owns the current game. Orchestrators swap in a complete new game, they
 * never rebuild the current one in place, so anybody holding on to `game`
 * sees either the old or the new game.
 */
export class GameHandle extends EventEmitter<GameHandleEvents> {
    private current?: GoGame;

    constructor(game?: GoGame) {
        super();
        this.current = game;
    }

    get game(): GoGame | undefined {
        return this.current;
    }

    public requireGame(): GoGame {
        if (!this.current) {
            throw new Error("No current game");
        }
        return this.current;
    }

    public replace(new_game: GoGame): void {
        const old_game = this.current;
        this.notify("game.will_replace", () => this.emit("game.will_replace", old_game));
        this.current = new_game;
        this.notify("game.replaced", () => this.emit("game.replaced", new_game, old_game));
    }

    public notifyLoaded(game: GoGame, game_name?: string): void {
        this.notify("game.loaded", () => this.emit("game.loaded", game, game_name));
    }

    /* Listeners are collaborators we don't control, a throwing one must not
     * leave the handle between two games. */
    private notify(event: keyof GameHandleEvents, emit: () => void): void {
        try {
            emit();
        } catch (e) {
            console.error(`GameHandle ${event} listener error`, e);
        }
    }
}
