import type { Singleflight } from "../single-flight"

function deferred<T>() {
  let resolve!: (value: T) => void
  let reject!: (reason: unknown) => void

  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })

  return { promise, resolve, reject }
}

export function describeSingleflightContract(
  name: string,
  create: () => Singleflight<string>,
): void {
  describe(`Singleflight contract - ${name}`, () => {
    let flights: Singleflight<string>

    beforeEach(() => {
      flights = create()
    })

    it("runs fn once for concurrent callers of the same key", async () => {
      const gate = deferred<string>()
      let calls = 0
      const fn = () => {
        calls++
        return gate.promise
      }

      const all = Promise.all([
        flights.run("k", fn),
        flights.run("k", fn),
        flights.run("k", fn),
      ])

      gate.resolve("nodes")
      const [a, b, c] = await all

      expect(calls).toBe(1)
      expect(a.source).toBe("leader")
      expect(b.source).toBe("inflight")
      expect(c.source).toBe("inflight")
      expect([a.value, b.value, c.value]).toEqual(["nodes", "nodes", "nodes"])
    })

    it("reports how many callers joined the leader", async () => {
      const gate = deferred<string>()

      const leader = flights.run("k", () => gate.promise)
      const follower = flights.run("k", () => gate.promise)

      gate.resolve("v")

      expect((await leader).sharedWith).toBe(1)
      expect((await follower).sharedWith).toBe(1)
    })

    it("keeps different keys independent", async () => {
      let calls = 0
      const fn = async () => {
        calls++
        return "v"
      }

      await Promise.all([flights.run("a", fn), flights.run("b", fn)])

      expect(calls).toBe(2)
    })

    it("shares a rejection with every waiter", async () => {
      const gate = deferred<string>()
      const failure = new Error("endpoint unreachable")

      const first = flights.run("k", () => gate.promise)
      const second = flights.run("k", () => gate.promise)

      gate.reject(failure)

      await Promise.all([
        expect(first).rejects.toBe(failure),
        expect(second).rejects.toBe(failure),
      ])
    })

    it("frees the key once the flight settles", async () => {
      await flights.run("k", async () => "one")

      expect(flights.has("k")).toBe(false)
      expect(flights.size).toBe(0)

      const again = await flights.run("k", async () => "two")

      expect(again).toEqual({ value: "two", sharedWith: 0, source: "leader" })
    })

    it("frees the key after a rejection", async () => {
      await expect(
        flights.run("k", async () => {
          throw new Error("boom")
        }),
      ).rejects.toThrow("boom")

      expect(flights.has("k")).toBe(false)
    })
  })
}
