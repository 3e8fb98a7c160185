import { ActionIntent } from "../types/action.types";
import {
  intentPoints,
  isActionKind,
  mapIntentPoints,
  requiresPoint,
} from "./action.utils";

describe("action utils", () => {
  it("recognizes known kinds only", () => {
    expect(isActionKind("CLICK")).toBe(true);
    expect(isActionKind("OPEN_URL")).toBe(true);
    expect(isActionKind("click")).toBe(false);
    expect(isActionKind("TELEPORT")).toBe(false);
  });

  it("flags pointer kinds as requiring a point", () => {
    expect(requiresPoint("DOUBLE_CLICK")).toBe(true);
    expect(requiresPoint("DRAG")).toBe(true);
    expect(requiresPoint("MOVE")).toBe(true);
    expect(requiresPoint("TYPE")).toBe(false);
    expect(requiresPoint("SCROLL")).toBe(false);
  });

  it("maps both drag endpoints", () => {
    const drag: ActionIntent = {
      kind: "DRAG",
      point: { x: 100, y: 100 },
      end: { x: 500, y: 500 },
      duration: 0.5,
      confidence: 1,
    };

    const mapped = mapIntentPoints(drag, (p) => ({ x: p.x * 2, y: p.y * 2 }));

    expect(intentPoints(mapped)).toEqual([
      { x: 200, y: 200 },
      { x: 1000, y: 1000 },
    ]);
    expect(intentPoints(drag)).toEqual([
      { x: 100, y: 100 },
      { x: 500, y: 500 },
    ]);
  });

  it("leaves point-less intents untouched", () => {
    const press: ActionIntent = { kind: "PRESS", key: "enter", confidence: 1 };
    expect(mapIntentPoints(press, () => ({ x: 0, y: 0 }))).toBe(press);
    expect(intentPoints(press)).toEqual([]);
  });
});
