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

import { spawn, ChildProcessWithoutNullStreams } from "child_process";
import { EventEmitter } from "eventemitter3";

export interface GtpTransportEvents {
    /** Raw text read from the engine's standard output */
    data: (chunk: string) => void;
    /** The engine went away; nothing more will be read */
    exit: (code: number | null) => void;
}

/**
 * The byte stream a GtpClient talks over. GtpEngineProcess is the real
 * thing, tests substitute an in-process stand-in.
 */
export abstract class GtpTransport extends EventEmitter<GtpTransportEvents> {
    abstract get running(): boolean;
    abstract write(data: string): void;
    abstract close(): void;
}

export interface GtpEngineProcessOptions {
    /** Executable of the engine, e.g. "fuego" */
    command: string;
    args?: string[];
    /**
     * Working directory of the engine. File arguments such as the one of
     * `loadsgf` are resolved against it.
     */
    cwd?: string;
    /** Don't log start/exit/stderr things */
    quiet?: boolean;
}

/** Runs a GTP engine as a child process and exposes its stdin/stdout. */
export class GtpEngineProcess extends GtpTransport {
    public readonly options: GtpEngineProcessOptions;
    private child?: ChildProcessWithoutNullStreams;
    private exited = false;

    constructor(options: GtpEngineProcessOptions) {
        super();
        this.options = options;
    }

    get running(): boolean {
        return this.child !== undefined && !this.exited;
    }

    public start(): void {
        if (this.child) {
            throw new Error("GTP engine process already started");
        }

        const child = spawn(this.options.command, this.options.args ?? [], {
            cwd: this.options.cwd,
            stdio: "pipe",
        });
        this.child = child;

        child.stdout.setEncoding("utf8");
        child.stderr.setEncoding("utf8");

        child.stdout.on("data", (chunk: string) => {
            this.emit("data", chunk);
        });
        child.stderr.on("data", (chunk: string) => {
            if (!this.options.quiet) {
                console.warn(`GTP engine stderr: ${chunk.trimEnd()}`);
            }
        });
        child.stdin.on("error", (err: Error) => {
            console.error("GTP engine stdin error", err);
        });
        child.on("error", (err: Error) => {
            console.error(`GTP engine "${this.options.command}" failed`, err);
            this.onExit(null);
        });
        child.on("exit", (code: number | null) => {
            this.onExit(code);
        });

        if (!this.options.quiet) {
            console.log(`GTP engine started: ${this.options.command}`);
        }
    }

    public write(data: string): void {
        if (!this.child || this.exited) {
            throw new Error("GTP engine process is not running");
        }
        this.child.stdin.write(data);
    }

    public close(): void {
        if (this.child && !this.exited) {
            this.child.stdin.end();
        }
    }

    private onExit(code: number | null): void {
        if (this.exited) {
            return;
        }
        this.exited = true;
        if (!this.options.quiet) {
            console.info(`GTP engine exited with code ${code}`);
        }
        this.emit("exit", code);
    }
}
