/*
 * Copyright (C)  Online-Go.com
 */

import {
    GoColor,
    _,
    colorName,
    formatLoadGameFailure,
    interpolate,
    setGtpSessionTranslations,
} from "gtp-session";

afterEach(() => {
    setGtpSessionTranslations({});
});

describe("formatLoadGameFailure", () => {
    test("Wrong player", () => {
        expect(
            formatLoadGameFailure({
                message_id: "wrong_color_to_move",
                move_number: 2,
                color: GoColor.BLACK,
                expected: GoColor.WHITE,
            }),
        ).toBe(
            "Game contains a move by the wrong player: Move 2, played by Black, but White is to move.",
        );
    });

    test("Illegal move", () => {
        expect(
            formatLoadGameFailure({
                message_id: "illegal_move",
                move_number: 5,
                color: GoColor.BLACK,
                vertex: "A1",
                reason: "suicide",
            }),
        ).toBe(
            "Game contains an illegal move: Move 5, played by Black, on intersection A1. Reason: The move is suicidal.",
        );
    });

    test("Move after the end of the game", () => {
        expect(
            formatLoadGameFailure({
                message_id: "move_after_game_ended",
                move_number: 3,
                color: GoColor.WHITE,
                ended_reason: "resigned",
            }),
        ).toBe(
            "Game contains a move after the game has already ended (by resignation): Move 3, played by White.",
        );
    });

    test("Invalid move string", () => {
        expect(
            formatLoadGameFailure({
                message_id: "invalid_move_string",
                problem: "invalid_format",
                move: "B",
            }),
        ).toBe("Internal error: Move string has invalid format. Move string = B");
    });

    test("Invalid board setup", () => {
        expect(
            formatLoadGameFailure({
                message_id: "invalid_setup",
                vertex: "D4",
                problem: "intersection_set_up_twice",
            }),
        ).toBe(
            "Game contains an invalid board setup prior to the first move: intersection D4, the intersection is set up more than once.",
        );
    });

    test("Bad save file", () => {
        expect(
            formatLoadGameFailure({
                message_id: "not_a_valid_save_file",
                reason: "cannot load file",
            }),
        ).toBe("The file is not a valid save file. The engine reported: cannot load file");
        expect(formatLoadGameFailure({ message_id: "board_size_not_supported", size: 8 })).toBe(
            "The board size is not supported: 8.",
        );
    });
});

describe("Translations", () => {
    test("Catalog entries replace the defaults", () => {
        setGtpSessionTranslations({ Black: "Schwarz" });
        expect(colorName(GoColor.BLACK)).toBe("Schwarz");
        expect(colorName(GoColor.WHITE)).toBe("White");
    });

    test("Debug mode marks untranslated strings", () => {
        setGtpSessionTranslations({}, true);
        expect(_("White")).toBe("[White]");
    });

    test("interpolate", () => {
        expect(interpolate("%s and %d", ["a", 1])).toBe("a and 1");
        expect(interpolate("Move %d", 7)).toBe("Move 7");
        expect(interpolate("{{a}}-{{b}}", { a: "x", b: 2 })).toBe("x-2");
        expect(() => interpolate("{{x}}", {})).toThrow(
            "Missing interpolation key: x for string: {{x}}",
        );
    });
});
