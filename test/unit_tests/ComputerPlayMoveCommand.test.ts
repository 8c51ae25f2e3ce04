/*
 * Copyright (C)  Online-Go.com
 */

import {
    ComputerPlayMoveCommand,
    GoColor,
    GoGame,
    GoMoveError,
    GtpClient,
    GtpEngineUnavailableError,
    GtpProtocolError,
    computerPlayer,
    humanPlayer,
} from "gtp-session";
import { FakeGtpEngine } from "./test_utils";

function connect(): [FakeGtpEngine, GtpClient] {
    const engine = new FakeGtpEngine();
    return [engine, new GtpClient(engine, { quiet: true })];
}

function scriptGenmove(engine: FakeGtpEngine, answers: string[]): void {
    engine.handlers["genmove"] = () => answers.shift() ?? "? no more moves";
}

function computerAsBlack(): GoGame {
    return new GoGame({
        board_size: 9,
        player_black: computerPlayer("Computer"),
        player_white: humanPlayer("Human"),
    });
}

describe("ComputerPlayMoveCommand", () => {
    test("Plays the generated move", async () => {
        const [engine, client] = connect();
        scriptGenmove(engine, ["= E5"]);
        const game = computerAsBlack();

        await new ComputerPlayMoveCommand(client, game).submit();

        expect(engine.commands).toEqual(["genmove b"]);
        expect(game.board.get({ x: 4, y: 4 })).toBe(GoColor.BLACK);
        expect(game.currentColorToMove()).toBe(GoColor.WHITE);
        expect(game.computer_thinks).toBe(false);
    });

    test("Keeps playing while the computer is to move", async () => {
        const [engine, client] = connect();
        scriptGenmove(engine, ["= C3", "= pass", "= pass"]);
        const game = new GoGame({
            board_size: 9,
            player_black: computerPlayer("Black"),
            player_white: computerPlayer("White"),
        });

        await new ComputerPlayMoveCommand(client, game).submit();

        expect(engine.commands).toEqual(["genmove b", "genmove w", "genmove b"]);
        expect(game.moves.map((move) => move.type)).toEqual(["play", "pass", "pass"]);
        expect(game.state).toBe("ended");
        expect(game.reason_ended).toBe("two_passes");
    });

    test("Resignation", async () => {
        const [engine, client] = connect();
        scriptGenmove(engine, ["= resign"]);
        const game = computerAsBlack();

        await new ComputerPlayMoveCommand(client, game).submit();

        expect(game.state).toBe("ended");
        expect(game.resigned_color).toBe(GoColor.BLACK);
    });

    test("The command stays pending until the engine answers", async () => {
        const [engine, client] = connect();
        scriptGenmove(engine, ["= E5"]);
        engine.hold = true;
        const game = computerAsBlack();

        let settled = false;
        const promise = new ComputerPlayMoveCommand(client, game)
            .submit()
            .then(() => (settled = true));
        await new Promise((resolve) => setImmediate(resolve));

        expect(settled).toBe(false);
        expect(game.computer_thinks).toBe(true);
        expect(client.pending_count).toBe(1);

        engine.release();
        await promise;

        expect(settled).toBe(true);
        expect(game.moves).toHaveLength(1);
    });

    test("A failed genmove rejects", async () => {
        const [engine, client] = connect();
        scriptGenmove(engine, ["? engine error"]);
        const game = computerAsBlack();

        await expect(new ComputerPlayMoveCommand(client, game).submit()).rejects.toBeInstanceOf(
            GtpProtocolError,
        );
        expect(game.computer_thinks).toBe(false);
        expect(game.moves).toHaveLength(0);
    });

    test("An invalid vertex rejects", async () => {
        const [engine, client] = connect();
        scriptGenmove(engine, ["= Z99"]);

        await expect(
            new ComputerPlayMoveCommand(client, computerAsBlack()).submit(),
        ).rejects.toThrow('"genmove b" answered with an invalid vertex: Z99');
    });

    test("An illegal generated move rejects", async () => {
        const [engine, client] = connect();
        scriptGenmove(engine, ["= E5", "= E5"]);
        const game = new GoGame({
            board_size: 9,
            player_black: computerPlayer("Black"),
            player_white: computerPlayer("White"),
        });

        await expect(new ComputerPlayMoveCommand(client, game).submit()).rejects.toBeInstanceOf(
            GoMoveError,
        );
        expect(game.moves).toHaveLength(1);
        expect(game.computer_thinks).toBe(false);
    });

    test("The engine going away rejects", async () => {
        const [engine, client] = connect();
        engine.hold = true;
        const game = computerAsBlack();

        const promise = new ComputerPlayMoveCommand(client, game).submit();
        engine.stop();

        await expect(promise).rejects.toBeInstanceOf(GtpEngineUnavailableError);
        expect(game.computer_thinks).toBe(false);
    });

    test("An engine that is not running rejects right away", async () => {
        const [engine, client] = connect();
        engine.stop();

        await expect(
            new ComputerPlayMoveCommand(client, computerAsBlack()).submit(),
        ).rejects.toBeInstanceOf(GtpEngineUnavailableError);
        expect(engine.commands).toEqual([]);
    });

    test("Only on a computer player's turn", async () => {
        const [engine, client] = connect();

        await expect(
            new ComputerPlayMoveCommand(client, new GoGame({ board_size: 9 })).submit(),
        ).rejects.toThrow("It is not a computer player's turn");
        expect(engine.commands).toEqual([]);
    });
});
