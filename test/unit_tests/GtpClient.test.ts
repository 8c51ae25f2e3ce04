/*
 * Copyright (C)  Online-Go.com
 */

import {
    GtpClient,
    GtpClientState,
    GtpEngineUnavailableError,
    GtpError,
    GtpLog,
    GtpProtocolError,
    GtpResponse,
} from "gtp-session";
import { FakeGtpEngine } from "./test_utils";

function connect(): [FakeGtpEngine, GtpClient] {
    const engine = new FakeGtpEngine();
    const client = new GtpClient(engine, { quiet: true });
    engine.handlers["echo"] = (args) => `= ${args.join(" ")}`;
    return [engine, client];
}

describe("GtpClient", () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("Responses reach their submitters in submission order", async () => {
        const [, client] = connect();
        const order: string[] = [];

        client.send("echo 1", (response) => order.push(response?.parsed_response ?? "none"));
        const second = client
            .sendPromise("echo 2")
            .then((response) => order.push(response.parsed_response));
        client.send("echo 3", (response) => order.push(response?.parsed_response ?? "none"));
        const last = await client.sendPromise("echo 4");
        await second;

        expect(order).toEqual(["1", "2", "3"]);
        expect(last.parsed_response).toBe("4");
        expect(last.command).toBe("echo 4");
    });

    test("Only one command is on the wire at a time", async () => {
        const [engine, client] = connect();
        engine.hold = true;

        client.send("a");
        client.send("b");
        client.send("c");

        expect(engine.commands).toEqual(["a"]);
        expect(client.state).toBe("awaiting_response");
        expect(client.pending_count).toBe(3);

        engine.release();
        await client.sendPromise("d");

        expect(engine.commands).toEqual(["a", "b", "c", "d"]);
        expect(client.pending_count).toBe(0);
        expect(client.state).toBe("idle");
    });

    test("State transitions", async () => {
        const [, client] = connect();
        const states: GtpClientState[] = [];
        client.on("state", (state) => states.push(state));

        await client.sendPromise("clear_board");

        expect(states).toEqual(["writing", "awaiting_response", "idle"]);
    });

    test("Failure answers are delivered, not thrown", async () => {
        const [engine, client] = connect();
        engine.handlers["boardsize"] = "? unacceptable size";

        const response = await client.sendPromise("boardsize 3");

        expect(response.status).toBe(false);
        expect(response.parsed_response).toBe("unacceptable size");
    });

    test("sendChecked rejects failure answers", async () => {
        const [engine, client] = connect();
        engine.handlers["boardsize"] = "? unacceptable size";

        const promise = client.sendChecked("boardsize 3");

        await expect(promise).rejects.toBeInstanceOf(GtpProtocolError);
        await expect(promise).rejects.toThrow(
            'GTP command "boardsize 3" failed: unacceptable size',
        );
    });

    test("Submitting to an engine that is not running fails immediately", async () => {
        const [engine, client] = connect();
        engine.stop();

        expect(() => client.send("clear_board")).toThrow(GtpEngineUnavailableError);
        await expect(client.sendPromise("clear_board")).rejects.toBeInstanceOf(
            GtpEngineUnavailableError,
        );
        expect(engine.commands).toEqual([]);
        expect(client.running).toBe(false);
    });

    test("Commands still pending when the engine exits are failed", async () => {
        const [engine, client] = connect();
        engine.hold = true;
        const unavailable = jest.fn();
        client.on("unavailable", unavailable);

        const errors: Array<GtpError | undefined> = [];
        const first = client.sendPromise("genmove b");
        client.send("komi 6.5", (response, error) => {
            expect(response).toBeUndefined();
            errors.push(error);
        });

        engine.stop(3);

        await expect(first).rejects.toThrow(
            'GTP engine unavailable, cannot process "genmove b": engine exited with code 3',
        );
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(GtpEngineUnavailableError);
        expect(unavailable).toHaveBeenCalledTimes(1);
        expect(client.pending_count).toBe(0);
        expect(client.state).toBe("idle");
    });

    test("Invalid commands are rejected", () => {
        const [engine, client] = connect();

        expect(() => client.send("")).toThrow(GtpError);
        expect(() => client.send("   ")).toThrow(GtpError);
        expect(() => client.send("clear_board\nquit")).toThrow(GtpError);
        expect(engine.commands).toEqual([]);
    });

    test("Answers split across reads", async () => {
        const [engine, client] = connect();
        engine.hold = true;

        const promise = client.sendPromise("showboard");
        engine.emit("data", "= line1\nli");
        engine.emit("data", "ne2\n\n");

        const response = await promise;
        expect(response.parsed_response).toBe("line1\nline2");
        expect(response.lines).toEqual(["line1", "line2"]);
    });

    test("A throwing continuation does not stall the queue", async () => {
        const [, client] = connect();
        const error_log = jest.spyOn(console, "error").mockImplementation(() => undefined);

        client.send("echo 1", () => {
            throw new Error("boom");
        });
        const response = await client.sendPromise("echo 2");

        expect(response.parsed_response).toBe("2");
        expect(error_log).toHaveBeenCalledTimes(1);
    });

    test("Throwing submission and state listeners do not stall the queue", async () => {
        const [engine, client] = connect();
        const error_log = jest.spyOn(console, "error").mockImplementation(() => undefined);
        client.once("command_submitted", () => {
            throw new Error("listener boom");
        });
        client.once("state", () => {
            throw new Error("state boom");
        });

        const first = await client.sendPromise("echo 1");
        const second = await client.sendPromise("echo 2");

        expect(first.parsed_response).toBe("1");
        expect(second.parsed_response).toBe("2");
        expect(engine.commands).toEqual(["echo 1", "echo 2"]);
        expect(client.state).toBe("idle");
        expect(client.pending_count).toBe(0);
        expect(error_log).toHaveBeenCalledTimes(2);
    });

    test("response_received fires before the continuation", async () => {
        const [, client] = connect();
        const events: string[] = [];
        client.on("command_submitted", (command) => events.push(`submitted ${command}`));
        client.on("response_received", (response: GtpResponse) =>
            events.push(`received ${response.parsed_response}`),
        );

        await client.sendPromise("echo x").then(() => events.push("continuation"));

        expect(events).toEqual(["submitted echo x", "received x", "continuation"]);
    });

    test("quit closes the transport after the answer", async () => {
        const [engine, client] = connect();

        await client.quit();

        expect(engine.commands).toEqual(["quit"]);
        expect(engine.running).toBe(false);
        expect(client.running).toBe(false);
    });
});

describe("GtpLog", () => {
    test("Records commands and answers", async () => {
        const [engine, client] = connect();
        engine.handlers["get_komi"] = "= 6.5";
        engine.handlers["boardsize"] = "? unacceptable size";
        const log = new GtpLog(client);

        await client.sendPromise("get_komi");
        await client.sendPromise("boardsize 3");

        expect(log.items.map((item) => [item.command, item.status, item.parsed_response])).toEqual(
            [
                ["get_komi", true, "6.5"],
                ["boardsize 3", false, "unacceptable size"],
            ],
        );
        expect(log.items[0].answered_at).toBeGreaterThanOrEqual(log.items[0].submitted_at);
    });

    test("Keeps only the most recent items", async () => {
        const [, client] = connect();
        const log = new GtpLog(client, 2);

        await client.sendPromise("echo 1");
        await client.sendPromise("echo 2");
        await client.sendPromise("echo 3");

        expect(log.items.map((item) => item.command)).toEqual(["echo 2", "echo 3"]);
    });

    test("Unanswered items stay unanswered when the engine exits", async () => {
        const [engine, client] = connect();
        const log = new GtpLog(client);
        engine.hold = true;

        const pending = client.sendPromise("genmove b");
        engine.stop();
        await expect(pending).rejects.toBeInstanceOf(GtpEngineUnavailableError);

        expect(log.items).toHaveLength(1);
        expect(log.items[0].status).toBeUndefined();
        expect(log.items[0].answered_at).toBeUndefined();
    });

    test("detach stops recording", async () => {
        const [, client] = connect();
        const log = new GtpLog(client);

        await client.sendPromise("echo 1");
        log.detach();
        await client.sendPromise("echo 2");

        expect(log.items.map((item) => item.command)).toEqual(["echo 1"]);
        log.clear();
        expect(log.items).toEqual([]);
    });

    test("Size must be positive", () => {
        const [, client] = connect();
        expect(() => new GtpLog(client, 0)).toThrow("Invalid GTP log size 0");
    });
});
