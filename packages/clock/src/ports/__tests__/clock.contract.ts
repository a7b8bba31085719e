import type { Clock } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
}

export function describeClockContract(h: ClockHarness) {
  describe(`${h.name} (Clock contract)`, () => {
    let clock: Clock

    beforeEach(() => {
      clock = h.make()
    })

    it("now() and nowMs() describe the same instant", () => {
      const date = clock.now()
      const ms = clock.nowMs()

      expect(date).toBeInstanceOf(Date)
      expect(typeof ms).toBe("number")
      expect(Math.abs(date.getTime() - ms)).toBeLessThan(5)
    })

    it("nowMs() never runs backwards across a sleep", async () => {
      const before = clock.nowMs()
      await clock.sleep(20)

      expect(clock.nowMs() - before).toBeGreaterThanOrEqual(15)
    })

    it("sleep(0) resolves to undefined", async () => {
      await expect(clock.sleep(0)).resolves.toBeUndefined()
    })

    it("sleep() returns at once for an already aborted signal", async () => {
      const ac = new AbortController()
      ac.abort()
      const before = clock.nowMs()

      await expect(clock.sleep(10_000, ac.signal)).resolves.toBeUndefined()
      expect(clock.nowMs() - before).toBeLessThan(1000)
    })
  })
}
