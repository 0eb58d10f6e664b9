import { describe, test, expect } from "vitest"
import { LoopbackTransport } from "../federation/loopback-transport.js"
import { RpcResponse, type RpcRequest } from "../federation/rpc.js"
import { ErrTransportClosed, ErrUnknownTarget } from "../federation/rpc-errors.js"
import { SurrogateError } from "../surrogate-error.js"
import { NotFound } from "../errors/errors.js"

const request: RpcRequest = { id: "req-1", target: "demo.Calc", method: "add", args: [2, 3] }

describe("LoopbackTransport", () => {
  test("resolves with the dispatched result", async () => {
    const seen: RpcRequest[] = []
    const transport = new LoopbackTransport(async (req) => {
      seen.push(req)
      return RpcResponse.ok(req.id, 5)
    })

    await expect(transport.send(request)).resolves.toBe(5)
    expect(seen).toEqual([request])
  })

  test("rejects with the reconstituted error", async () => {
    const transport = new LoopbackTransport(async (req) =>
      RpcResponse.error(req.id, SurrogateError.serialize(ErrUnknownTarget.create({ target: req.target }))),
    )

    const err: unknown = await transport.send(request).catch((e: unknown) => e)
    expect(ErrUnknownTarget.is(err)).toBe(true)
    expect(SurrogateError.has(err, NotFound)).toBe(true)
    expect(SurrogateError.isSurrogateError(err) && err.data).toEqual({ target: "demo.Calc" })
  })

  test("refuses to send after close", async () => {
    const transport = new LoopbackTransport(async (req) => RpcResponse.ok(req.id, null))
    await transport.close()

    const err: unknown = await transport.send(request).catch((e: unknown) => e)
    expect(ErrTransportClosed.is(err)).toBe(true)
  })
})
