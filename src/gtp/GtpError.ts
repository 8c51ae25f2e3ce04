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

import type { GtpResponse } from "./GtpResponse";

export class GtpError extends Error {
    constructor(message?: string) {
        super(message); // 'Error' breaks prototype chain here
        Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
        this.name = new.target.name;
    }
}

/**
 * The engine process is not running. Raised synchronously when submitting,
 * and delivered to every command still waiting for an answer when the
 * engine goes away.
 */
export class GtpEngineUnavailableError extends GtpError {
    command: string;

    constructor(command: string, detail?: string) {
        super(`GTP engine unavailable, cannot process "${command}"${detail ? ": " + detail : ""}`);
        this.command = command;
    }
}

/** A command answered with failure status where success was required */
export class GtpProtocolError extends GtpError {
    command: string;
    response: GtpResponse;

    constructor(command: string, response: GtpResponse) {
        super(
            `GTP command "${command}" failed: ${response.parsed_response || "(no reason given)"}`,
        );
        this.command = command;
        this.response = response;
    }
}

/**
 * The engine disagreed with an operation that must not fail. This is not
 * recovered from.
 */
export class GtpInternalConsistencyError extends GtpError {
    command: string;
    response: GtpResponse;

    constructor(command: string, response: GtpResponse) {
        super(
            `Internal consistency failure, engine rejected "${command}": ${
                response.parsed_response || "(no reason given)"
            }`,
        );
        this.command = command;
        this.response = response;
    }
}
