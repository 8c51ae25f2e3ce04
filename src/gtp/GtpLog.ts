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
import type { GtpResponse } from "./GtpResponse";

export interface GtpLogItem {
    command: string;
    submitted_at: number;
    /* The following are filled in once the engine answers */
    answered_at?: number;
    status?: boolean;
    parsed_response?: string;
}

const DEFAULT_LOG_SIZE = 1000;

/**
 * Keeps the most recent commands sent through a GtpClient together with
 * their answers. The oldest items are dropped once `size` is exceeded.
 */
export class GtpLog {
    public readonly size: number;
    public items: GtpLogItem[] = [];

    private client: GtpClient;
    private unanswered: GtpLogItem[] = [];

    constructor(client: GtpClient, size: number = DEFAULT_LOG_SIZE) {
        if (size < 1) {
            throw new Error(`Invalid GTP log size ${size}`);
        }
        this.client = client;
        this.size = size;
        this.client.on("command_submitted", this.onCommandSubmitted);
        this.client.on("response_received", this.onResponseReceived);
        this.client.on("unavailable", this.onUnavailable);
    }

    public clear(): void {
        this.items = [];
    }

    /** Stops recording */
    public detach(): void {
        this.client.off("command_submitted", this.onCommandSubmitted);
        this.client.off("response_received", this.onResponseReceived);
        this.client.off("unavailable", this.onUnavailable);
        this.unanswered = [];
    }

    private onCommandSubmitted = (command: string): void => {
        const item: GtpLogItem = { command, submitted_at: Date.now() };
        this.items.push(item);
        this.unanswered.push(item);
        if (this.items.length > this.size) {
            this.items.splice(0, this.items.length - this.size);
        }
    };

    private onResponseReceived = (response: GtpResponse): void => {
        const item = this.unanswered.shift();
        if (!item) {
            return;
        }
        item.answered_at = Date.now();
        item.status = response.status;
        item.parsed_response = response.parsed_response;
    };

    private onUnavailable = (): void => {
        this.unanswered = [];
    };
}
