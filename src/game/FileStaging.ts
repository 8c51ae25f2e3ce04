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

import { copyFile, rm } from "fs/promises";
import * as path from "path";

export const STAGED_LOAD_FILE_NAME = "loadgame.sgf";
export const STAGED_SAVE_FILE_NAME = "savegame.sgf";

/**
 * A temporary copy of a game file under a name that can be passed to the
 * engine as a command argument. `name` is relative to the staging
 * directory, which is the engine's working directory.
 */
export interface StagedFile {
    name: string;
    path: string;
    released: boolean;
}

/** true if `name` can be sent as a single GTP argument */
export function isProtocolSafeFileName(name: string): boolean {
    return /^[\x21-\x7e]+$/.test(name) && !name.includes("#");
}

export function stagedFile(staging_directory: string, name: string): StagedFile {
    if (!isProtocolSafeFileName(name)) {
        throw new Error(`Staged file name cannot be sent to the engine: ${JSON.stringify(name)}`);
    }
    return { name, path: path.join(staging_directory, name), released: false };
}

/** Copies `source_path` into the staging directory. A partial copy is removed again. */
export async function stageFile(
    source_path: string,
    staging_directory: string,
    name: string = STAGED_LOAD_FILE_NAME,
): Promise<StagedFile> {
    const staged = stagedFile(staging_directory, name);
    try {
        await copyFile(source_path, staged.path);
    } catch (e) {
        await releaseStagedFile(staged);
        throw e;
    }
    return staged;
}

/** Deletes the staged copy. Releasing twice is a no-op. */
export async function releaseStagedFile(staged: StagedFile): Promise<void> {
    if (staged.released) {
        return;
    }
    staged.released = true;
    await rm(staged.path, { force: true });
}
