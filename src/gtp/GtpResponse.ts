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

/**
 * One engine answer. A raw answer looks like `= payload`, `=12 payload` or
 * `? error text`, possibly spanning several lines, and is terminated on the
 * wire by an empty line (which is not part of `raw_response`).
 */
export class GtpResponse {
    public readonly command: string;
    public readonly raw_response: string;
    /** true for `=`, false for `?` */
    public readonly status: boolean;
    /** The payload with the status character, id and surrounding whitespace removed */
    public readonly parsed_response: string;
    public readonly id?: number;

    private constructor(
        command: string,
        raw_response: string,
        status: boolean,
        parsed_response: string,
        id?: number,
    ) {
        this.command = command;
        this.raw_response = raw_response;
        this.status = status;
        this.parsed_response = parsed_response;
        this.id = id;
    }

    public static parse(raw_response: string, command: string): GtpResponse {
        const match = /^([=?])(\d*)([\s\S]*)$/.exec(raw_response);
        if (!match) {
            // Not a GTP answer at all, treat it as a failure carrying the text
            return new GtpResponse(command, raw_response, false, raw_response.trim());
        }
        const id = match[2] ? parseInt(match[2], 10) : undefined;
        return new GtpResponse(command, raw_response, match[1] === "=", match[3].trim(), id);
    }

    /** The payload split into lines, empty when there is no payload */
    public get lines(): string[] {
        if (this.parsed_response === "") {
            return [];
        }
        return this.parsed_response.split(/\r?\n/);
    }
}
