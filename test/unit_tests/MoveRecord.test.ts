/*
 * Copyright (C)  Online-Go.com
 */

import { GoBoard, GoColor, parseMoveRecord, splitMoveList } from "gtp-session";

describe("splitMoveList", () => {
    test("Commas and line breaks separate moves", () => {
        expect(splitMoveList("B C3, W G7\nB pass,")).toEqual(["B C3", "W G7", "B pass"]);
        expect(splitMoveList("B C3,W G7\r\nB resign")).toEqual(["B C3", "W G7", "B resign"]);
    });

    test("An empty list has no moves", () => {
        expect(splitMoveList("")).toEqual([]);
        expect(splitMoveList(" \n ")).toEqual([]);
    });
});

describe("parseMoveRecord", () => {
    const board = new GoBoard({ size: 9 });

    test("Moves", () => {
        expect(parseMoveRecord("B C3", board)).toEqual({
            type: "play",
            color: GoColor.BLACK,
            point: { x: 2, y: 6 },
            vertex: "C3",
        });
        expect(parseMoveRecord("w g7", board)).toEqual({
            type: "play",
            color: GoColor.WHITE,
            point: { x: 6, y: 2 },
            vertex: "G7",
        });
    });

    test("Pass and resign", () => {
        expect(parseMoveRecord("W pass", board)).toEqual({ type: "pass", color: GoColor.WHITE });
        expect(parseMoveRecord("B PASS", board)).toEqual({ type: "pass", color: GoColor.BLACK });
        expect(parseMoveRecord("B resign", board)).toEqual({
            type: "resign",
            color: GoColor.BLACK,
        });
    });

    test("Problems", () => {
        expect(parseMoveRecord("B", board)).toEqual({ problem: "invalid_format" });
        expect(parseMoveRecord("B C3 C4", board)).toEqual({ problem: "invalid_format" });
        expect(parseMoveRecord("X C3", board)).toEqual({ problem: "invalid_color" });
        expect(parseMoveRecord("B Z9", board)).toEqual({ problem: "invalid_vertex" });
        expect(parseMoveRecord("B K1", board)).toEqual({ problem: "invalid_vertex" });
    });
});
