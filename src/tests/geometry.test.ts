import { describe, it, expect } from "vitest";
import { normalizeRotation, placePins, rotateOffset, transformAngle, transformPin, transformPoint } from "../kicad/Geometry";
import { ValidationError } from "../kicad/errors";
import { LibraryPin } from "../kicad/types";

function pin(number: string, x: number, y: number, rotation: number, unit = 0): LibraryPin {
  return { number, name: "~", x, y, rotation, length: 1.27, electricalType: "passive", unit, hidden: false };
}

describe("transformPoint", () => {
  const top = { x: 0, y: 3.81 };

  it("flips library Y onto the sheet", () => {
    expect(transformPoint(top, { x: 100, y: 100, rotation: 0 })).toEqual({ x: 100, y: 96.19 });
  });

  it("rotates counter-clockwise on screen", () => {
    expect(transformPoint(top, { x: 100, y: 100, rotation: 90 })).toEqual({ x: 96.19, y: 100 });
    expect(transformPoint(top, { x: 100, y: 100, rotation: 180 })).toEqual({ x: 100, y: 103.81 });
    expect(transformPoint(top, { x: 100, y: 100, rotation: 270 })).toEqual({ x: 103.81, y: 100 });
  });

  it("mirrors before rotating", () => {
    const p = { x: 2.54, y: 1.27 };
    expect(transformPoint(p, { x: 100, y: 100, rotation: 0, mirror: "x" })).toEqual({ x: 102.54, y: 101.27 });
    expect(transformPoint(p, { x: 100, y: 100, rotation: 0, mirror: "y" })).toEqual({ x: 97.46, y: 98.73 });
    // mirror x then 90°: (2.54, 1.27) -> rotate -> (1.27, -2.54)
    expect(transformPoint(p, { x: 0, y: 0, rotation: 90, mirror: "x" })).toEqual({ x: 1.27, y: -2.54 });
  });

  it("rejects rotations off the 90 degree grid", () => {
    expect(() => transformPoint(top, { x: 0, y: 0, rotation: 45 })).toThrow(ValidationError);
  });
});

describe("normalizeRotation", () => {
  it("wraps into 0..270", () => {
    expect(normalizeRotation(-90)).toBe(270);
    expect(normalizeRotation(450)).toBe(90);
    expect(normalizeRotation(360)).toBe(0);
  });
});

describe("transformAngle", () => {
  it("follows mirror and rotation", () => {
    expect(transformAngle(270, { x: 0, y: 0, rotation: 90 })).toBe(0);
    expect(transformAngle(0, { x: 0, y: 0, rotation: 0, mirror: "y" })).toBe(180);
    expect(transformAngle(90, { x: 0, y: 0, rotation: 0, mirror: "x" })).toBe(270);
  });
});

describe("placePins", () => {
  it("places shared pins with every unit and unit pins only with their own", () => {
    const pins = [pin("8", 0, 7.62, 270, 0), pin("1", 7.62, 0, 180, 1), pin("7", 7.62, 0, 180, 2)];
    const placed = placePins(pins, { x: 50, y: 50, rotation: 0 }, 2);
    expect(placed.map(p => p.number)).toEqual(["8", "7"]);
    expect(placed[1]).toEqual({ number: "7", name: "~", x: 57.62, y: 50, rotation: 180, electricalType: "passive" });
  });

  it("keeps the pin's own data on transform", () => {
    expect(transformPin(pin("2", 0, -3.81, 90), { x: 10, y: 10, rotation: 180 })).toEqual({
      number: "2",
      name: "~",
      x: 10,
      y: 6.19,
      rotation: 270,
      electricalType: "passive",
    });
  });
});

describe("rotateOffset", () => {
  it("rotates board offsets counter-clockwise on screen", () => {
    expect(rotateOffset({ x: 1, y: 0 }, 90)).toEqual({ x: 0, y: -1 });
    expect(rotateOffset({ x: -0.825, y: 0 }, 90)).toEqual({ x: 0, y: 0.825 });
    expect(rotateOffset({ x: 1, y: 0 }, 45)).toEqual({ x: 0.7071, y: -0.7071 });
  });
});
