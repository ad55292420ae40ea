import { ValidationError } from "./errors";
import { LibraryPin, Placement, PlacedPin, Point } from "./types";

// Exact values for the four legal orientations; no floating trigonometry.
const COS: Record<number, number> = { 0: 1, 90: 0, 180: -1, 270: 0 };
const SIN: Record<number, number> = { 0: 0, 90: 1, 180: 0, 270: -1 };

export function round4(value: number): number {
  const rounded = Math.round(value * 10000) / 10000;
  return rounded === 0 ? 0 : rounded;
}

/**
 * Normalize an angle to 0, 90, 180 or 270.
 * @throws ValidationError for angles that are not a multiple of 90
 */
export function normalizeRotation(rotation: number): number {
  if (!Number.isFinite(rotation) || Math.abs(rotation % 90) > 1e-9) {
    throw new ValidationError(`Rotation must be a multiple of 90 degrees, got ${rotation}`, { rotation });
  }
  return ((Math.round(rotation / 90) % 4) + 4) % 4 * 90;
}

function normalizeAngle(angle: number): number {
  return ((Math.round(angle) % 360) + 360) % 360;
}

/**
 * Map a point from library space (Y up) onto the sheet (Y down) for a symbol
 * placed at `placement`.
 *
 * Order: flip Y, mirror, rotate counter-clockwise on screen, translate.
 * Mirror `x` flips across the horizontal axis, mirror `y` across the vertical one.
 */
export function transformPoint(local: Point, placement: Placement): Point {
  const rotation = normalizeRotation(placement.rotation);
  let x = local.x;
  let y = -local.y;

  if (placement.mirror === "x") y = -y;
  else if (placement.mirror === "y") x = -x;

  const cos = COS[rotation];
  const sin = SIN[rotation];
  const rx = x * cos + y * sin;
  const ry = -x * sin + y * cos;

  return { x: round4(placement.x + rx), y: round4(placement.y + ry) };
}

/** Pin direction after the same mirror and rotation, in degrees. */
export function transformAngle(angle: number, placement: Placement): number {
  let result = angle;
  if (placement.mirror === "x") result = -result;
  else if (placement.mirror === "y") result = 180 - result;
  return normalizeAngle(result + normalizeRotation(placement.rotation));
}

export function transformPin(pin: LibraryPin, placement: Placement): PlacedPin {
  const point = transformPoint(pin, placement);
  return {
    number: pin.number,
    name: pin.name,
    x: point.x,
    y: point.y,
    rotation: transformAngle(pin.rotation, placement),
    electricalType: pin.electricalType,
  };
}

/**
 * Pins of one unit placed on the sheet. Pins of unit 0 belong to every unit.
 */
export function placePins(pins: LibraryPin[], placement: Placement, unit: number): PlacedPin[] {
  return pins.filter(pin => pin.unit === 0 || pin.unit === unit).map(pin => transformPin(pin, placement));
}

export function samePoint(a: Point, b: Point, tolerance: number): boolean {
  return Math.abs(a.x - b.x) <= tolerance && Math.abs(a.y - b.y) <= tolerance;
}

/** Rotate a board-relative offset by any angle, counter-clockwise on screen (Y down). */
export function rotateOffset(local: Point, degrees: number): Point {
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return { x: round4(local.x * cos + local.y * sin), y: round4(-local.x * sin + local.y * cos) };
}
