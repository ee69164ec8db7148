import test from "node:test";
import assert from "node:assert/strict";
import { EventBus } from "@cadlink/event-bus";
import type { Backend, CadStatus, ICadClient, PlaneInfo, SketchInfo } from "@cadlink/cad-clients";
import { ConnectionManager } from "@cadlink/connection-manager";
import { Line, SketchDocument } from "@cadlink/sketch-model";
import { TransferOrchestrator, selectAllSketches } from "@cadlink/transfer";
import { parseCommand, type TransferCommand } from "./cli.js";
import { runTransfer } from "./transfer.js";

class StubClient implements ICadClient {
  connected = false;
  calls: string[] = [];
  imported: Array<{ sketch: string; name: string | undefined }> = [];

  constructor(
    readonly backend: Backend,
    readonly reachable: boolean,
    readonly documents: SketchDocument[] = [],
  ) {}

  async connect(): Promise<boolean> {
    this.calls.push("connect");
    this.connected = this.reachable;
    return this.reachable;
  }

  async disconnect(): Promise<void> {
    this.calls.push("disconnect");
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async getStatus(): Promise<CadStatus> {
    return {};
  }

  async listSketches(): Promise<SketchInfo[]> {
    return this.documents.map((doc) => ({ name: doc.name, label: doc.name, geometryCount: 1, constraintCount: 0 }));
  }

  async listPlanes(): Promise<PlaneInfo[]> {
    return [];
  }

  async exportSketch(name: string): Promise<SketchDocument> {
    const doc = this.documents.find((candidate) => candidate.name === name);
    if (!doc) throw new Error(`No sketch named ${name}`);
    return doc.clone();
  }

  async importSketch(doc: SketchDocument, name?: string): Promise<string> {
    this.imported.push({ sketch: doc.name, name });
    return name ?? `${doc.name}001`;
  }

  async openSketch(): Promise<boolean> {
    return true;
  }
}

function sketch(name: string): SketchDocument {
  return new SketchDocument(name, { primitives: [new Line("l1", { x: 0, y: 0 }, { x: 10, y: 0 })] });
}

function setup(argv: string[], source: SketchDocument[], targetReachable = true) {
  const bus = new EventBus();
  const freecad = new StubClient("freecad", true, source);
  const fusion = new StubClient("fusion", targetReachable);
  const manager = new ConnectionManager({
    bus,
    clientFactory: (backend) => (backend === "freecad" ? freecad : fusion),
  });
  const orchestrator = new TransferOrchestrator(bus, manager, selectAllSketches);
  const parsed = parseCommand(argv);
  const command: TransferCommand = parsed.kind === "transfer" ? parsed : assert.fail("not a transfer");
  const reported: string[] = [];
  const transfer = () => runTransfer(manager, orchestrator, command, (line) => reported.push(line));
  return { freecad, fusion, reported, transfer };
}

test("runTransfer: a single sketch is imported under --name and both backends are released", async () => {
  const { freecad, fusion, reported, transfer } = setup(["transfer", "freecad", "fusion", "--name", "copy"], [
    sketch("plate"),
  ]);

  assert.equal(await transfer(), 0);
  assert.deepEqual(fusion.imported, [{ sketch: "plate", name: "copy" }]);
  assert.deepEqual(reported, []);
  assert.deepEqual(freecad.calls, ["connect", "disconnect"]);
  assert.deepEqual(fusion.calls, ["connect", "disconnect"]);
});

test("runTransfer: every sketch is copied under its own name without --name", async () => {
  const { fusion, transfer } = setup(["transfer", "freecad", "fusion"], [sketch("plate"), sketch("rib")]);

  assert.equal(await transfer(), 0);
  assert.deepEqual(fusion.imported, [
    { sketch: "plate", name: undefined },
    { sketch: "rib", name: undefined },
  ]);
});

test("runTransfer: --name with several sketches is refused before anything is imported", async () => {
  const { freecad, fusion, reported, transfer } = setup(["transfer", "freecad", "fusion", "--name", "copy"], [
    sketch("plate"),
    sketch("rib"),
  ]);

  assert.equal(await transfer(), 1);
  assert.deepEqual(reported, ["--name needs a single sketch, 2 were selected"]);
  assert.deepEqual(fusion.imported, []);
  assert.deepEqual(freecad.calls, ["connect", "disconnect"]);
  assert.deepEqual(fusion.calls, ["connect", "disconnect"]);
});

test("runTransfer: an unreachable target is reported and the source is still released", async () => {
  const { freecad, fusion, reported, transfer } = setup(["transfer", "freecad", "fusion"], [sketch("plate")], false);

  assert.equal(await transfer(), 1);
  assert.deepEqual(reported, ["Fusion 360 is not reachable"]);
  assert.deepEqual(freecad.calls, ["connect", "disconnect"]);
  assert.deepEqual(fusion.calls, ["connect", "disconnect"]);
});

test("runTransfer: an empty source exits 1 and releases both backends", async () => {
  const { freecad, fusion, reported, transfer } = setup(["transfer", "freecad", "fusion"], []);

  assert.equal(await transfer(), 1);
  assert.deepEqual(reported, ["Nothing to transfer from FreeCAD: no-sketches"]);
  assert.deepEqual(freecad.calls, ["connect", "disconnect"]);
  assert.deepEqual(fusion.calls, ["connect", "disconnect"]);
});
