import { MotorUtils } from "@/math/Motor";
import type { Motor, RotationPlane, Vector4 } from "@/types";
import { MOTOR_FIELDS } from "@/types";
import { createMixedMotor, expectMotorClose, expectVectorClose } from "@test/helpers/motorHelpers";
import { describe, expect, it } from "vitest";

const SEQUENCE = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16];
const SCATTERED = [3, -1, 4, -1, 5, -9, 2, -6, 5, -3, 5, 8, -9, 7, -9, 3];
const FRACTIONS = [0.5, -1.25, 2, 0.75, -3, 1.5, -0.5, 2.25, -1.75, 0.25, 3.5, -2.5, 1, -0.75, 4, -1.5];

describe("MotorUtils", () => {
  describe("construction", () => {
    it("identity has s = 1 and every other field zero", () => {
      expect(MotorUtils.toArray(MotorUtils.identity())).toEqual([
        1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0,
      ]);
    });

    it("create fills missing fields with zero", () => {
      const m = MotorUtils.create({ e13: 2, e0234: -1 });
      expect(m.e13).toBe(2);
      expect(m.e0234).toBe(-1);
      expect(m.s).toBe(0);
      expect(m.e1234).toBe(0);
    });

    it("fromArray and toArray use the canonical field order", () => {
      const m = MotorUtils.fromArray(SEQUENCE);
      expect(m.s).toBe(1);
      expect(m.e01).toBe(2);
      expect(m.e34).toBe(11);
      expect(m.e0123).toBe(12);
      expect(m.e1234).toBe(16);
      expect(MotorUtils.toArray(m)).toEqual(SEQUENCE);
      expect(MOTOR_FIELDS).toHaveLength(16);
    });

    it("fromArray rejects the wrong number of components", () => {
      expect(() => MotorUtils.fromArray(SEQUENCE.slice(1))).toThrow(
        new RangeError("Motor requires 16 components, got 15")
      );
    });
  });

  describe("compose", () => {
    const a = MotorUtils.fromArray(SEQUENCE);
    const b = MotorUtils.fromArray(SCATTERED);

    it("computes the full geometric product", () => {
      expect(MotorUtils.toArray(MotorUtils.compose(a, b))).toEqual([
        69, 150, 61, 111, 190, -157, 10, -4, -54, 34, 299, -224, 71, 523, -184, -31,
      ]);
    });

    it("is not commutative", () => {
      expect(MotorUtils.toArray(MotorUtils.compose(b, a))).toEqual([
        69, -440, -127, -295, 50, -51, 0, -174, 262, 126, 29, 162, -101, -273, 558, -31,
      ]);
    });

    it("has the identity as neutral element on both sides", () => {
      const g = MotorUtils.fromArray(FRACTIONS);
      const identity = MotorUtils.identity();
      expect(MotorUtils.compose(identity, g)).toEqual(g);
      expect(MotorUtils.compose(g, identity)).toEqual(g);
      expect(MotorUtils.compose(identity, a)).toEqual(a);
      expect(MotorUtils.compose(a, identity)).toEqual(a);
    });

    it("is associative", () => {
      const x = createMixedMotor();
      const y = MotorUtils.compose(MotorUtils.rotation("yw", 0.4), MotorUtils.translation([0, 1, -1, 2]));
      const z = MotorUtils.rotation("xy", -1.2);
      expectMotorClose(
        MotorUtils.compose(MotorUtils.compose(x, y), z),
        MotorUtils.compose(x, MotorUtils.compose(y, z)),
        1e-12
      );
    });

    it("keeps products of unit motors at unit magnitude", () => {
      let m = MotorUtils.identity();
      for (let i = 0; i < 50; i++) {
        m = MotorUtils.compose(m, createMixedMotor());
      }
      expect(MotorUtils.magnitudeSquared(m)).toBeCloseTo(1, 12);
    });

    it("squares a rotation bivector to -1", () => {
      const e12 = MotorUtils.create({ e12: 1 });
      const product = MotorUtils.compose(e12, e12);
      expect(MotorUtils.approxEquals(product, MotorUtils.create({ s: -1 }), 0)).toBe(true);
    });

    it("multiplies bivectors sharing one basis vector into a third", () => {
      const product = MotorUtils.compose(MotorUtils.create({ e12: 1 }), MotorUtils.create({ e23: 1 }));
      expect(MotorUtils.approxEquals(product, MotorUtils.create({ e13: 1 }), 0)).toBe(true);
    });

    it("anticommutes a translation bivector with a rotation bivector", () => {
      const e01 = MotorUtils.create({ e01: 1 });
      const e12 = MotorUtils.create({ e12: 1 });
      expect(
        MotorUtils.approxEquals(MotorUtils.compose(e01, e12), MotorUtils.create({ e02: 1 }), 0)
      ).toBe(true);
      expect(
        MotorUtils.approxEquals(MotorUtils.compose(e12, e01), MotorUtils.create({ e02: -1 }), 0)
      ).toBe(true);
    });

    it("adds translations", () => {
      const composed = MotorUtils.compose(
        MotorUtils.translation([1, 0, 0, 0]),
        MotorUtils.translation([0, 2, 0, 0])
      );
      expect(MotorUtils.approxEquals(composed, MotorUtils.translation([1, 2, 0, 0]), 0)).toBe(true);
      expect(MotorUtils.transformPoint(composed, [0, 0, 0, 0])).toEqual([1, 2, 0, 0]);
    });

    it("applies the right operand first", () => {
      // Move along +x, then a quarter turn in xy carries +x onto -y
      const motor = MotorUtils.compose(
        MotorUtils.rotation("xy", Math.PI / 2),
        MotorUtils.translation([1, 0, 0, 0])
      );
      expectVectorClose(MotorUtils.transformPoint(motor, [0, 0, 0, 0]), [0, -1, 0, 0]);
      expect(motor.s).toBeCloseTo(Math.SQRT1_2, 12);
      expect(motor.e34).toBeCloseTo(Math.SQRT1_2, 12);
      expect(motor.e03).toBeCloseTo(-0.35355339059327373, 12);
      expect(motor.e04).toBeCloseTo(-0.3535533905932738, 12);
    });
  });

  describe("reverse", () => {
    it("negates exactly the grade-2 fields", () => {
      const reversed = MotorUtils.toArray(MotorUtils.reverse(MotorUtils.fromArray(SEQUENCE)));
      expect(reversed).toEqual([1, -2, -3, -4, -5, -6, -7, -8, -9, -10, -11, 12, 13, 14, 15, 16]);
    });

    it("is an involution", () => {
      const b = MotorUtils.fromArray(SCATTERED);
      expect(MotorUtils.reverse(MotorUtils.reverse(b))).toEqual(b);
    });

    it("undoes a unit motor", () => {
      const m = createMixedMotor();
      const roundTrip = MotorUtils.compose(m, MotorUtils.reverse(m));
      expectVectorClose(MotorUtils.transformPoint(roundTrip, [1, 2, 3, 4]), [1, 2, 3, 4], 12);
      expectMotorClose(roundTrip, MotorUtils.identity(), 1e-12);
    });
  });

  describe("magnitude", () => {
    it("sums the squares of the non-translational fields", () => {
      // 1 + 6² + 7² + ... + 11² + 16²
      expect(MotorUtils.magnitudeSquared(MotorUtils.fromArray(SEQUENCE))).toBe(708);
    });

    it("ignores translation fields", () => {
      const m = MotorUtils.create({ s: 2, e01: 5, e0123: -3 });
      expect(MotorUtils.magnitudeSquared(m)).toBe(4);
      expect(MotorUtils.magnitude(m)).toBe(2);
    });

    it("is one for translations and rotations", () => {
      expect(MotorUtils.magnitudeSquared(MotorUtils.translation([3, -4, 5, -6]))).toBe(1);
      expect(MotorUtils.magnitude(MotorUtils.rotation("yw", 1.3))).toBeCloseTo(1, 12);
    });
  });

  describe("normalized", () => {
    it("scales every field by the inverse magnitude", () => {
      const m = MotorUtils.normalized(MotorUtils.create({ s: 2, e01: 1, e23: 2, e1234: 1 }));
      expect(m.s).toBeCloseTo(2 / 3, 15);
      expect(m.e01).toBeCloseTo(1 / 3, 15);
      expect(m.e23).toBeCloseTo(2 / 3, 15);
      expect(m.e1234).toBeCloseTo(1 / 3, 15);
      expect(MotorUtils.magnitude(m)).toBeCloseTo(1, 12);
    });

    it("leaves a unit motor unchanged", () => {
      const m = createMixedMotor();
      expectMotorClose(MotorUtils.normalized(m), m, 1e-15);
    });

    it("throws for a zero motor", () => {
      expect(() => MotorUtils.normalized(MotorUtils.create({}))).toThrow(
        new RangeError("Cannot normalize a motor with magnitude 0")
      );
    });

    it("throws for a pure translation bivector", () => {
      expect(() => MotorUtils.normalized(MotorUtils.create({ e02: 1 }))).toThrow(RangeError);
    });

    it("throws for a non-finite motor", () => {
      expect(() => MotorUtils.normalized(MotorUtils.create({ s: Number.NaN }))).toThrow(
        new RangeError("Cannot normalize a motor with magnitude NaN")
      );
    });
  });

  describe("translation", () => {
    it("moves a point by the offset", () => {
      const t = MotorUtils.translation([1.5, -2, 3, 0.25]);
      expect(MotorUtils.transformPoint(t, [4, 5, -6, 7])).toEqual([5.5, 3, -3, 7.25]);
    });

    it("stores half the offset in the translation bivectors", () => {
      const t = MotorUtils.translation([2, 4, 6, 8]);
      expect(t.s).toBe(1);
      expect(t.e01).toBe(4);
      expect(t.e02).toBe(-3);
      expect(t.e03).toBe(2);
      expect(t.e04).toBe(-1);
    });

    it("places the origin at the offset", () => {
      const t = MotorUtils.translation([-4.5, 0.5, -1.5, 0.5]);
      expect(MotorUtils.transformPoint(t, [0, 0, 0, 0])).toEqual([-4.5, 0.5, -1.5, 0.5]);
    });
  });

  describe("rotation", () => {
    const p: Vector4 = [1, 2, 3, 4];
    const cases: [RotationPlane, Vector4][] = [
      ["xy", [2.05327756175987, 0.8854666873312858, 3, 4]],
      ["xz", [-1.1678108744285844, 2, 2.9387442490911564, 4]],
      ["xw", [3.3417129362352527, 2, 3, 2.4151510619002625]],
      ["yz", [1, 3.46233743628205, 1.0060911873780833, 4]],
      ["yw", [1, -1.0471863743817873, 3, 4.347804123613336]],
      ["zw", [1, 2, 4.871397310804229, 1.1267156874248805]],
    ];

    it.each(cases)("rotates by 0.7 rad in the %s plane", (plane, expected) => {
      expectVectorClose(MotorUtils.transformPoint(MotorUtils.rotation(plane, 0.7), p), expected, 12);
    });

    it("leaves the axes outside the plane untouched", () => {
      const rotated = MotorUtils.transformPoint(MotorUtils.rotation("yw", 0.7), p);
      expect(rotated[0]).toBe(1);
      expect(rotated[2]).toBe(3);
    });

    it("turns +x toward +z in the xz plane", () => {
      const rotated = MotorUtils.transformPoint(MotorUtils.rotation("xz", 0.7), [1, 0, 0, 0]);
      expectVectorClose(rotated, [Math.cos(0.7), 0, Math.sin(0.7), 0], 12);
    });

    it("accepts bivector names for the same planes", () => {
      const pairs: [RotationPlane, RotationPlane][] = [
        ["xy", "e34"],
        ["xz", "e24"],
        ["xw", "e14"],
        ["yz", "e23"],
        ["yw", "e13"],
        ["zw", "e12"],
      ];
      for (const [cartesian, bivector] of pairs) {
        expect(MotorUtils.rotation(cartesian, 0.4)).toEqual(MotorUtils.rotation(bivector, 0.4));
      }
    });

    it("uses the half-angle", () => {
      const r = MotorUtils.rotation("xy", 1);
      expect(r.s).toBe(Math.cos(0.5));
      expect(r.e34).toBe(Math.sin(0.5));
    });

    it("composes rotations in one plane by adding angles", () => {
      const twice = MotorUtils.compose(MotorUtils.rotation("zw", 0.3), MotorUtils.rotation("zw", 0.4));
      expectMotorClose(twice, MotorUtils.rotation("zw", 0.7), 1e-15);
    });
  });

  describe("transformDirection", () => {
    it("ignores translation", () => {
      const t = MotorUtils.translation([3, -4, 5, -6]);
      const directions: Vector4[] = [
        [1, 2, 3, 4],
        [0, 0, 0, 0],
        [-1, 0.5, 0, 2],
      ];
      for (const n of directions) {
        expect(MotorUtils.transformDirection(t, n)).toEqual(n);
      }
    });

    it("matches transformPoint on the difference of two points", () => {
      const m = createMixedMotor();
      const a = MotorUtils.transformPoint(m, [1, 2, 3, 4]);
      const b = MotorUtils.transformPoint(m, [0, 1, 1, 1]);
      const direction = MotorUtils.transformDirection(m, [1, 1, 2, 3]);
      expectVectorClose(direction, [a[0] - b[0], a[1] - b[1], a[2] - b[2], a[3] - b[3]], 12);
    });

    it("never reads the translation fields", () => {
      const rotationOnly: Motor = MotorUtils.rotation("xw", 0.9);
      const withGarbage: Motor = { ...rotationOnly, e01: Number.NaN, e0123: Number.NaN };
      expect(MotorUtils.transformDirection(withGarbage, [1, 2, 3, 4])).toEqual(
        MotorUtils.transformDirection(rotationOnly, [1, 2, 3, 4])
      );
    });
  });

  describe("approxEquals", () => {
    it("compares within an absolute tolerance", () => {
      const a = MotorUtils.identity();
      const b = MotorUtils.create({ s: 1, e24: 1e-10 });
      expect(MotorUtils.approxEquals(a, b)).toBe(true);
      expect(MotorUtils.approxEquals(a, b, 1e-11)).toBe(false);
    });
  });
});
