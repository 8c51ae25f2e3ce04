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

export enum GoColor {
    EMPTY = 0,
    BLACK = 1,
    WHITE = 2,
}

export type PlayerColor = GoColor.BLACK | GoColor.WHITE;

export function opponentOf(color: PlayerColor): PlayerColor {
    return color === GoColor.BLACK ? GoColor.WHITE : GoColor.BLACK;
}

/** The color argument GTP commands like `genmove` take */
export function colorToGtp(color: PlayerColor): "b" | "w" {
    return color === GoColor.BLACK ? "b" : "w";
}

/** Accepts "b", "w", "black" and "white" in any case */
export function parseColor(str: string): PlayerColor | undefined {
    switch (str.toLowerCase()) {
        case "b":
        case "black":
            return GoColor.BLACK;
        case "w":
        case "white":
            return GoColor.WHITE;
    }
    return undefined;
}
