import { fullJitter } from "../full"

describe("fullJitter", () => {
  it("scales the delay by the random draw", () => {
    expect(fullJitter({ next: () => 0.25 }).apply(400)).toBe(100)
  })

  it("returns 0 for a zero draw", () => {
    expect(fullJitter({ next: () => 0 }).apply(400)).toBe(0)
  })

  it("can reach the full delay", () => {
    expect(fullJitter({ next: () => 0.9999 }).apply(100)).toBe(100)
  })
})
