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

import { copyFile } from "fs/promises";
import type { GtpClient } from "../gtp/GtpClient";
import { STAGED_SAVE_FILE_NAME, releaseStagedFile, stagedFile } from "./FileStaging";

export interface SaveGameOptions {
    /** The engine's working directory, where it writes the file */
    staging_directory: string;
}

/**
 * Saves the engine's current game as SGF. The engine writes the file under
 * a staging name in its working directory, which is then copied to the
 * target.
 */
export class SaveGameCommand {
    public readonly options: SaveGameOptions;
    private client: GtpClient;

    constructor(client: GtpClient, options: SaveGameOptions) {
        this.client = client;
        this.options = options;
    }

    /** Rejects with GtpProtocolError if the engine cannot write the file */
    public async save(target_path: string): Promise<void> {
        const staged = stagedFile(this.options.staging_directory, STAGED_SAVE_FILE_NAME);
        try {
            await this.client.sendChecked(`savesgf ${staged.name}`);
            await copyFile(staged.path, target_path);
        } finally {
            await releaseStagedFile(staged);
        }
    }
}
