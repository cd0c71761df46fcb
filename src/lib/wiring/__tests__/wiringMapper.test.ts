import { describe, it, expect } from "vitest"
import {
  buildPermutation,
  buildTraversalPath,
  convertWiring,
  designToHardware,
  getHardwareIndex,
  hardwareToDesign,
  permutationFromOrder,
} from "../wiringMapper"
import { START_CORNERS, WIRING_MODES } from "../types"
import type { StartCorner, WiringMode, WiringPermutation, WiringSpec } from "../types"
import { ConfigurationError, SizeMismatchError } from "@/lib/errors"

function wiring(
  width: number,
  height: number,
  mode: WiringMode,
  startCorner: StartCorner = "top_left",
  flips: Partial<Pick<WiringSpec, "flipX" | "flipY">> = {},
): WiringSpec {
  return { width, height, mode, startCorner, flipX: false, flipY: false, ...flips }
}

function cellAt(permutation: WiringPermutation, hardwareIndex: number) {
  const designIndex = permutation.order[hardwareIndex]
  return { x: designIndex % permutation.width, y: Math.floor(designIndex / permutation.width) }
}

const combinations = WIRING_MODES.flatMap((mode) =>
  START_CORNERS.map((corner): [WiringMode, StartCorner] => [mode, corner]),
)

describe("wiring mapper", () => {
  describe("buildPermutation", () => {
    it("should walk rows left to right for row_major from the top left", () => {
      const permutation = buildPermutation(wiring(12, 6, "row_major"))

      expect(cellAt(permutation, 0)).toEqual({ x: 0, y: 0 })
      expect(cellAt(permutation, 11)).toEqual({ x: 11, y: 0 })
      expect(cellAt(permutation, 12)).toEqual({ x: 0, y: 1 })
    })

    it("should reverse every other row for serpentine", () => {
      const permutation = buildPermutation(wiring(12, 6, "serpentine"))

      expect(cellAt(permutation, 11)).toEqual({ x: 11, y: 0 })
      expect(cellAt(permutation, 12)).toEqual({ x: 11, y: 1 })
      expect(cellAt(permutation, 23)).toEqual({ x: 0, y: 1 })
    })

    it.each<[WiringMode, StartCorner, number[]]>([
      ["column_major", "top_left", [0, 3, 1, 4, 2, 5]],
      ["column_serpentine", "top_left", [0, 3, 4, 1, 2, 5]],
      ["column_serpentine", "top_right", [2, 5, 4, 1, 0, 3]],
      ["serpentine", "bottom_left", [3, 4, 5, 2, 1, 0]],
      ["row_major", "bottom_right", [5, 4, 3, 2, 1, 0]],
    ])("should order a 3x2 grid for %s from %s", (mode, corner, order) => {
      expect(buildPermutation(wiring(3, 2, mode, corner)).order).toEqual(order)
    })

    it.each(combinations)("should start %s wiring in the %s corner", (mode, corner) => {
      const permutation = buildPermutation(wiring(5, 4, mode, corner))
      const expected = {
        top_left: { x: 0, y: 0 },
        top_right: { x: 4, y: 0 },
        bottom_left: { x: 0, y: 3 },
        bottom_right: { x: 4, y: 3 },
      }[corner]

      expect(cellAt(permutation, 0)).toEqual(expected)
    })

    it.each(combinations)("should be a bijection for %s from %s", (mode, corner) => {
      for (const flipX of [false, true]) {
        for (const flipY of [false, true]) {
          const { order, inverse } = buildPermutation(wiring(4, 3, mode, corner, { flipX, flipY }))

          expect([...order].sort((a, b) => a - b)).toEqual(Array.from({ length: 12 }, (_, i) => i))
          order.forEach((designIndex, hardwareIndex) => {
            expect(inverse[designIndex]).toBe(hardwareIndex)
          })
        }
      }
    })

    it.each(combinations)("should mirror columns with flipX for %s from %s", (mode, corner) => {
      const plain = buildPermutation(wiring(5, 3, mode, corner))
      const flipped = buildPermutation(wiring(5, 3, mode, corner, { flipX: true }))

      plain.order.forEach((_, hardwareIndex) => {
        const { x, y } = cellAt(plain, hardwareIndex)
        expect(cellAt(flipped, hardwareIndex)).toEqual({ x: 4 - x, y })
      })
    })

    it.each(combinations)("should mirror rows with flipY for %s from %s", (mode, corner) => {
      const plain = buildPermutation(wiring(5, 3, mode, corner))
      const flipped = buildPermutation(wiring(5, 3, mode, corner, { flipY: true }))

      plain.order.forEach((_, hardwareIndex) => {
        const { x, y } = cellAt(plain, hardwareIndex)
        expect(cellAt(flipped, hardwareIndex)).toEqual({ x, y: 2 - y })
      })
    })

    it("should reject an empty grid", () => {
      expect(() => buildPermutation(wiring(0, 4, "row_major"))).toThrow(ConfigurationError)
    })

    it("should freeze the permutation", () => {
      const permutation = buildPermutation(wiring(2, 2, "serpentine"))

      expect(Object.isFrozen(permutation)).toBe(true)
      expect(Object.isFrozen(permutation.order)).toBe(true)
    })
  })

  it("should list traversal cells before flips", () => {
    expect(buildTraversalPath(2, 2, "column_serpentine", "bottom_right")).toEqual([
      { x: 1, y: 1 },
      { x: 1, y: 0 },
      { x: 0, y: 0 },
      { x: 0, y: 1 },
    ])
  })

  describe("designToHardware / hardwareToDesign", () => {
    it.each(combinations)("should round-trip through %s from %s", (mode, corner) => {
      const pixels = Array.from({ length: 20 }, (_, i) => `p${i}`)

      for (const flipX of [false, true]) {
        for (const flipY of [false, true]) {
          const permutation = buildPermutation(wiring(5, 4, mode, corner, { flipX, flipY }))
          expect(hardwareToDesign(designToHardware(pixels, permutation), permutation)).toEqual(
            pixels,
          )
        }
      }
    })

    it("should return a new array and leave the input alone", () => {
      const pixels = ["a", "b", "c", "d", "e", "f"]
      const hardware = designToHardware(pixels, buildPermutation(wiring(3, 2, "serpentine")))

      expect(hardware).toEqual(["a", "b", "c", "f", "e", "d"])
      expect(hardware).not.toBe(pixels)
      expect(pixels).toEqual(["a", "b", "c", "d", "e", "f"])
    })

    it("should reject buffers of the wrong size", () => {
      const permutation = buildPermutation(wiring(3, 2, "row_major"))

      expect(() => designToHardware([1, 2, 3], permutation)).toThrow(SizeMismatchError)
      expect(() => hardwareToDesign([1, 2, 3, 4, 5, 6, 7], permutation)).toThrow(
        "Pixel buffer has 7 entries, expected 6",
      )
    })
  })

  describe("irregular shapes", () => {
    const activeCells = [
      { x: 2, y: 0 },
      { x: 0, y: 0 },
      { x: 1, y: 1 },
    ]

    it("should skip cells without an LED", () => {
      const permutation = buildPermutation({ ...wiring(3, 2, "row_major"), activeCells })

      expect(permutation.order).toEqual([0, 2, 4])
      expect(permutation.inverse).toEqual([0, -1, 1, -1, 2, -1])
    })

    it("should fill unwired cells when unwrapping", () => {
      const permutation = buildPermutation({ ...wiring(3, 2, "row_major"), activeCells })

      expect(designToHardware(["a", "b", "c", "d", "e", "f"], permutation)).toEqual([
        "a",
        "c",
        "e",
      ])
      expect(hardwareToDesign(["a", "c", "e"], permutation, ".")).toEqual([
        "a",
        ".",
        "c",
        ".",
        "e",
        ".",
      ])
    })

    it("should require a fill value for unwired cells", () => {
      const permutation = buildPermutation({ ...wiring(3, 2, "row_major"), activeCells })

      expect(() => hardwareToDesign(["a", "c", "e"], permutation)).toThrow(ConfigurationError)
    })
  })

  describe("getHardwareIndex", () => {
    const permutation = buildPermutation(wiring(3, 2, "serpentine"))

    it("should return the strip position of a cell", () => {
      expect(getHardwareIndex(0, 1, permutation)).toBe(5)
      expect(getHardwareIndex(2, 1, permutation)).toBe(3)
    })

    it("should return -1 outside the grid", () => {
      expect(getHardwareIndex(3, 0, permutation)).toBe(-1)
      expect(getHardwareIndex(0, -1, permutation)).toBe(-1)
    })
  })

  describe("permutationFromOrder", () => {
    it("should wrap a valid hand-wired order", () => {
      const permutation = permutationFromOrder([1, 0, 3, 2], 2, 2)

      expect(designToHardware(["a", "b", "c", "d"], permutation)).toEqual(["b", "a", "d", "c"])
      expect(permutation.inverse).toEqual([1, 0, 3, 2])
    })

    it.each<[number[], string]>([
      [[0, 1, 2], "Custom order has 3 entries, expected 4"],
      [[0, 1, 2, 4], "Custom order entry 4 is outside 0..3"],
      [[0, 1, 1, 2], "Custom order visits design index 1 twice"],
    ])("should reject %j", (order, message) => {
      expect(() => permutationFromOrder(order, 2, 2)).toThrow(message)
    })
  })

  describe("convertWiring", () => {
    it("should re-order a serpentine dump for column-major hardware", () => {
      const serpentine = buildPermutation(wiring(3, 2, "serpentine"))
      const columns = buildPermutation(wiring(3, 2, "column_major"))

      expect(convertWiring([0, 1, 2, 5, 4, 3], serpentine, columns)).toEqual([0, 3, 1, 4, 2, 5])
    })

    it("should refuse wirings of different sizes", () => {
      expect(() =>
        convertWiring(
          [0, 1, 2, 3],
          buildPermutation(wiring(2, 2, "row_major")),
          buildPermutation(wiring(4, 1, "row_major")),
        ),
      ).toThrow(ConfigurationError)
    })
  })
})
