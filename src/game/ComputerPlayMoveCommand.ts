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

import { colorToGtp } from "../go/GoColor";
import type { GoGame } from "../go/GoGame";
import type { GtpClient } from "../gtp/GtpClient";
import { GtpError, GtpProtocolError } from "../gtp/GtpError";
import type { GtpResponse } from "../gtp/GtpResponse";

/**
 * Asks the engine to generate moves for the computer player and plays them
 * on `game`, for as long as it is a computer player's turn.
 *
 * The promise returned by `submit()` settles only after the last `genmove`
 * has been answered and applied. Until then the client's pending-command
 * record holds the continuation, so the command stays alive for exactly as
 * long as the engine owes it an answer. Whoever triggers a computer move
 * receives this promise and is responsible for awaiting or handling it.
 */
export class ComputerPlayMoveCommand {
    public readonly game: GoGame;
    private client: GtpClient;

    constructor(client: GtpClient, game: GoGame) {
        this.client = client;
        this.game = game;
    }

    public submit(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (!this.game.next_move_player_is_computer_player) {
                reject(new GtpError("It is not a computer player's turn"));
                return;
            }
            this.requestMove(resolve, reject);
        });
    }

    private requestMove(resolve: () => void, reject: (reason: Error) => void): void {
        const command = `genmove ${colorToGtp(this.game.currentColorToMove())}`;
        this.game.computer_thinks = true;

        const fail = (reason: Error): void => {
            this.game.computer_thinks = false;
            reject(reason);
        };

        try {
            this.client.send(command, (response, error) => {
                if (!response) {
                    fail(error ?? new GtpError(`"${command}" was not answered`));
                    return;
                }
                try {
                    this.applyResponse(command, response);
                } catch (e) {
                    fail(e instanceof Error ? e : new GtpError(String(e)));
                    return;
                }

                if (this.game.next_move_player_is_computer_player) {
                    this.requestMove(resolve, reject);
                } else {
                    this.game.computer_thinks = false;
                    resolve();
                }
            });
        } catch (e) {
            fail(e instanceof Error ? e : new GtpError(String(e)));
        }
    }

    private applyResponse(command: string, response: GtpResponse): void {
        if (!response.status) {
            throw new GtpProtocolError(command, response);
        }

        const answer = response.parsed_response.toLowerCase();
        if (answer === "pass") {
            this.game.pass();
        } else if (answer === "resign") {
            this.game.resign();
        } else {
            const point = this.game.board.pointAtVertex(response.parsed_response);
            if (!point) {
                throw new GtpError(
                    `"${command}" answered with an invalid vertex: ${response.parsed_response}`,
                );
            }
            this.game.play(point);
        }
    }
}
