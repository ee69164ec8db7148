import { test, describe } from "node:test";
import assert from "node:assert/strict";
import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { z } from "zod";
import { RpcRemoteError, RpcTimeoutError } from "@cadlink/event-bus";
import { Backend } from "../src/backends.js";
import { FreeCadClient } from "../src/clients.js";
import { CadProtocolError, CadUnreachableError } from "../src/errors.js";
import { HttpRpcTransport, createHttpTransportFactory } from "../src/transport/HttpRpcTransport.js";

const ENDPOINT = { host: "cad-box", port: 9999 };
const RPC_URL = "http://cad-box:9999/";

const requestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.number(),
  method: z.string(),
  params: z.array(z.unknown()),
});

type RpcRequest = z.infer<typeof requestSchema>;
type Reply = { status?: number; data: unknown };

/** In-process stand-in for a plugin's HTTP endpoint. */
function fakeServer(handle: (request: RpcRequest, config: InternalAxiosRequestConfig) => Reply) {
  const seen: Array<{ url: string | undefined; timeout: number | undefined; request: RpcRequest }> = [];
  const adapter: AxiosAdapter = async (config) => {
    const request = requestSchema.parse(JSON.parse(String(config.data)));
    seen.push({ url: config.url, timeout: config.timeout, request });
    const reply = handle(request, config);
    return { data: reply.data, status: reply.status ?? 200, statusText: "", headers: {}, config };
  };
  return { client: axios.create({ adapter }), seen };
}

function result(request: RpcRequest, value: unknown): Reply {
  return { data: { jsonrpc: "2.0", id: request.id, result: value } };
}

describe("HttpRpcTransport", () => {
  test("posts a JSON-RPC 2.0 request and returns its result", async () => {
    const server = fakeServer((request) => result(request, `${request.method}:${request.params.length}`));
    const transport = new HttpRpcTransport(Backend.FREECAD, ENDPOINT, { client: server.client });

    assert.equal(await transport.call("open_sketch", ["plate"], 250), "open_sketch:1");
    assert.equal(await transport.call("ping", []), "ping:0");

    assert.deepEqual(server.seen, [
      { url: RPC_URL, timeout: 250, request: { jsonrpc: "2.0", id: 1, method: "open_sketch", params: ["plate"] } },
      { url: RPC_URL, timeout: 0, request: { jsonrpc: "2.0", id: 2, method: "ping", params: [] } },
    ]);
  });

  test("an error reply rejects with the remote message", async () => {
    const server = fakeServer((request) => ({
      data: { jsonrpc: "2.0", id: request.id, error: { code: -32000, message: "no sketch named plate" } },
    }));
    const transport = new HttpRpcTransport(Backend.FREECAD, ENDPOINT, { client: server.client });

    await assert.rejects(transport.call("export_sketch", ["plate"]), (error: unknown) => {
      assert.ok(error instanceof RpcRemoteError);
      assert.equal(error.message, "no sketch named plate");
      assert.equal(error.method, "export_sketch");
      return true;
    });
  });

  test("a failed HTTP status without a JSON-RPC body rejects with the status", async () => {
    const server = fakeServer(() => ({ status: 502, data: "<html>Bad Gateway</html>" }));
    const transport = new HttpRpcTransport(Backend.FUSION, ENDPOINT, { client: server.client });

    await assert.rejects(transport.call("get_status", []), (error: unknown) => {
      assert.ok(error instanceof RpcRemoteError);
      assert.equal(error.message, "HTTP 502");
      return true;
    });
  });

  test("a successful status with a body that is not JSON-RPC is a protocol error", async () => {
    const server = fakeServer(() => ({ data: { ok: true } }));
    const transport = new HttpRpcTransport(Backend.FUSION, ENDPOINT, { client: server.client });

    await assert.rejects(transport.call("get_status", []), CadProtocolError);
  });

  test("an aborted request rejects with a timeout", async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError("timeout of 20ms exceeded", AxiosError.ECONNABORTED, config);
    };
    const transport = new HttpRpcTransport(Backend.FREECAD, ENDPOINT, { client: axios.create({ adapter }) });

    await assert.rejects(transport.call("ping", [], 20), (error: unknown) => {
      assert.ok(error instanceof RpcTimeoutError);
      assert.equal(error.message, "RPC http://cad-box:9999/.ping timed out after 20ms");
      return true;
    });
  });

  test("a refused connection rejects as unreachable", async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError("connect ECONNREFUSED 127.0.0.1:9999", "ECONNREFUSED", config);
    };
    const transport = new HttpRpcTransport(Backend.FREECAD, ENDPOINT, { client: axios.create({ adapter }) });

    await assert.rejects(transport.call("ping", []), (error: unknown) => {
      assert.ok(error instanceof CadUnreachableError);
      assert.equal(error.message, "freecad: ping failed, backend unreachable (connect ECONNREFUSED 127.0.0.1:9999)");
      return true;
    });
  });

  test("a closed transport refuses further calls", async () => {
    const server = fakeServer((request) => result(request, true));
    const transport = new HttpRpcTransport(Backend.FREECAD, ENDPOINT, { client: server.client });
    transport.close();

    await assert.rejects(transport.call("ping", []), /closed/);
    assert.equal(server.seen.length, 0);
  });

  test("a custom path is appended to the endpoint", async () => {
    const server = fakeServer((request) => result(request, true));
    const transport = new HttpRpcTransport(Backend.FREECAD, ENDPOINT, { client: server.client, path: "/rpc" });

    await transport.call("ping", []);
    assert.equal(server.seen[0]?.url, "http://cad-box:9999/rpc");
  });
});

describe("RpcCadClient over HTTP", () => {
  test("connects through the backend's endpoint and loses the session when it stops answering", async () => {
    let up = true;
    const urls: Array<string | undefined> = [];
    const adapter: AxiosAdapter = async (config) => {
      urls.push(config.url);
      if (!up) throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
      const request = requestSchema.parse(JSON.parse(String(config.data)));
      const value = request.method === "ping" ? true : { activeDocument: "Part1", sketchCount: 2 };
      return { data: { jsonrpc: "2.0", id: request.id, result: value }, status: 200, statusText: "", headers: {}, config };
    };
    const client = new FreeCadClient({
      transport: createHttpTransportFactory({ client: axios.create({ adapter }) }),
      endpoint: { host: "cad-box", port: 9999 },
    });

    assert.equal(await client.connect(100), true);
    assert.deepEqual(await client.getStatus(100), { activeDocument: "Part1", sketchCount: 2 });

    up = false;
    await assert.rejects(client.getStatus(100), CadUnreachableError);
    assert.equal(client.isConnected(), false);
    assert.deepEqual(urls, [RPC_URL, RPC_URL, RPC_URL]);
  });
});
