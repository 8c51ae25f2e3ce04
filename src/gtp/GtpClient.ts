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
import { GtpResponse } from "./GtpResponse";
import { GtpError, GtpEngineUnavailableError, GtpProtocolError } from "./GtpError";
import type { GtpTransport } from "./GtpEngineProcess";

/**
 * Continuation of an asynchronously sent command. Exactly one of `response`
 * and `error` is set; `error` only when the engine went away before it
 * answered.
 */
export type GtpResponseCallback = (response: GtpResponse | undefined, error?: GtpError) => void;

export type GtpClientState = "idle" | "writing" | "awaiting_response";

export interface GtpClientEvents {
    /* Emitted right before a command is written to the engine */
    command_submitted: (command: string) => void;
    /* Emitted for every answer, before its continuation runs */
    response_received: (response: GtpResponse) => void;
    state: (state: GtpClientState) => void;
    /* The engine went away, every pending command has been failed */
    unavailable: () => void;
}

export interface GtpClientOptions {
    /** Don't log unexpected traffic and handler errors */
    quiet?: boolean;
}

interface PendingCommand {
    command: string;
    callback?: GtpResponseCallback;
}

/**
 * The single choke point for talking to a GTP engine. It provides:
 *
 *  - Strict request/response discipline, one command on the wire at a time
 *  - Responses dispatched in submission order, each to its own submitter
 *  - Callback based (`send`) and promise based (`sendPromise`) submission
 *  - Immediate failure when the engine is not running, and failure of every
 *    pending command when it stops, so no caller waits forever
 */
export class GtpClient extends EventEmitter<GtpClientEvents> {
    public options: GtpClientOptions;

    private transport: GtpTransport;
    private pending: PendingCommand[] = [];
    private current_state: GtpClientState = "idle";
    private read_buffer = "";
    private response_lines: string[] = [];

    constructor(transport: GtpTransport, options: GtpClientOptions = {}) {
        super();
        this.transport = transport;
        this.options = options;

        this.transport.on("data", this.onData);
        this.transport.on("exit", this.onExit);
    }

    get running(): boolean {
        return this.transport.running;
    }

    get state(): GtpClientState {
        return this.current_state;
    }

    /** Number of commands submitted but not yet answered, including the one on the wire */
    get pending_count(): number {
        return this.pending.length;
    }

    /**
     * Queues `command`. The callback, if any, is invoked once the engine has
     * answered, after the callbacks of every earlier command. Throws
     * GtpEngineUnavailableError right away if the engine is not running.
     */
    public send(command: string, cb?: GtpResponseCallback): void {
        const trimmed = command.trim();
        if (trimmed === "" || /[\r\n]/.test(trimmed)) {
            throw new GtpError(`Invalid GTP command: ${JSON.stringify(command)}`);
        }
        if (!this.transport.running) {
            throw new GtpEngineUnavailableError(trimmed);
        }

        this.pending.push({ command: trimmed, callback: cb });
        if (this.current_state === "idle" && this.pending.length === 1) {
            this.writeHead();
        }
    }

    /**
     * Queues `command` and resolves with the engine's answer, whatever its
     * status. Rejects with GtpEngineUnavailableError if the engine is not
     * running or stops before answering.
     */
    public sendPromise(command: string): Promise<GtpResponse> {
        return new Promise((resolve, reject) => {
            this.send(command, (response, error) => {
                if (response) {
                    resolve(response);
                } else {
                    reject(error ?? new GtpEngineUnavailableError(command));
                }
            });
        });
    }

    /** Like sendPromise, but an answer with failure status rejects with GtpProtocolError */
    public async sendChecked(command: string): Promise<GtpResponse> {
        const response = await this.sendPromise(command);
        if (!response.status) {
            throw new GtpProtocolError(command, response);
        }
        return response;
    }

    /** Asks the engine to quit and closes the transport once it has answered */
    public async quit(): Promise<void> {
        try {
            await this.sendPromise("quit");
        } finally {
            this.transport.close();
        }
    }

    private setState(state: GtpClientState): void {
        if (this.current_state !== state) {
            this.current_state = state;
            try {
                this.emit("state", state);
            } catch (e) {
                console.error("GtpClient state handler error", e);
            }
        }
    }

    private writeHead(): void {
        const head = this.pending[0];
        this.setState("writing");
        try {
            this.emit("command_submitted", head.command);
        } catch (e) {
            console.error("GtpClient command_submitted handler error", e);
        }
        try {
            this.transport.write(head.command + "\n");
        } catch (e) {
            this.failPending(e instanceof Error ? e.message : String(e));
            return;
        }
        // The engine may have exited while we were writing
        if (this.pending[0] === head) {
            this.setState("awaiting_response");
        }
    }

    private onData = (chunk: string): void => {
        this.read_buffer += chunk;

        let newline = this.read_buffer.indexOf("\n");
        while (newline >= 0) {
            const line = this.read_buffer.slice(0, newline).replace(/\r$/, "");
            this.read_buffer = this.read_buffer.slice(newline + 1);

            if (line.trim() === "") {
                // An empty line terminates a response; stray ones in between are ignored
                if (this.response_lines.length > 0) {
                    const raw = this.response_lines.join("\n");
                    this.response_lines = [];
                    this.dispatch(raw);
                }
            } else {
                this.response_lines.push(line);
            }

            newline = this.read_buffer.indexOf("\n");
        }
    };

    private dispatch(raw: string): void {
        const head = this.pending.shift();
        if (!head) {
            if (!this.options.quiet) {
                console.warn("GtpClient received a response with no command in flight", raw);
            }
            return;
        }

        const response = GtpResponse.parse(raw, head.command);
        this.setState("idle");

        try {
            this.emit("response_received", response);
        } catch (e) {
            console.error("GtpClient response_received handler error", e);
        }
        if (head.callback) {
            try {
                head.callback(response);
            } catch (e) {
                console.error(`GtpClient response handler error for "${head.command}"`, e);
            }
        }

        if (this.current_state === "idle" && this.pending.length > 0) {
            this.writeHead();
        }
    }

    private onExit = (code: number | null): void => {
        this.failPending(`engine exited with code ${code}`);
        try {
            this.emit("unavailable");
        } catch (e) {
            console.error("GtpClient unavailable handler error", e);
        }
    };

    private failPending(reason: string): void {
        const pending = this.pending;
        this.pending = [];
        this.response_lines = [];
        this.read_buffer = "";
        this.setState("idle");

        for (const { command, callback } of pending) {
            if (!callback) {
                continue;
            }
            try {
                callback(undefined, new GtpEngineUnavailableError(command, reason));
            } catch (e) {
                console.error(`GtpClient error handler error for "${command}"`, e);
            }
        }
    }
}
