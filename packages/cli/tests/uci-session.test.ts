import { describe, it, expect } from "vitest";
import { EngineUnavailableError, NoLegalMovesError } from "@movecraft/engine";
import { UciSession } from "../src/uci-session";
import { FakeTransport, flush } from "./helpers";

const FEN = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";

async function openSession(transport = new FakeTransport()) {
  const session = new UciSession(transport);
  await session.init();
  return { session, transport };
}

describe("UciSession", () => {
  it("performs the handshake and records the engine name", async () => {
    const transport = new FakeTransport();
    const session = new UciSession(transport);
    await session.init({ threads: 2, hashMb: 64 });

    expect(session.engineName).toBe("FakeFish 1.0");
    expect(transport.sent).toEqual([
      "uci",
      "setoption name Threads value 2",
      "setoption name Hash value 64",
      "isready",
    ]);
  });

  it("runs a MultiPV search and keeps the deepest line per slot", async () => {
    const { session, transport } = await openSession();
    transport.searches.push([
      "info depth 1 multipv 1 score cp 20 pv d2d4",
      "info depth 1 multipv 2 score cp 10 pv e2e4",
      "info depth 2 seldepth 3 multipv 1 score cp 30 nodes 100 pv e2e4 e7e5",
      "info depth 2 multipv 2 score mate -4 pv f2f3",
      "info depth 3 currmove g1f3 currmovenumber 1",
      "bestmove e2e4 ponder e7e5",
    ]);

    const lines = await session.analyze(FEN, { depth: 2, multiPv: 2, movetimeMs: 500 });
    expect(lines).toEqual([
      { uci: "e2e4", score: 30, depth: 2, pv: "e2e4 e7e5" },
      { uci: "f2f3", score: -29996, mate: -4, depth: 2, pv: "f2f3" },
    ]);
    expect(transport.sent.slice(2)).toEqual([
      "isready",
      "setoption name MultiPV value 2",
      "isready",
      `position fen ${FEN}`,
      "go depth 2 movetime 500",
    ]);
  });

  it("reports bestmove (none) as a position without legal moves", async () => {
    const { session, transport } = await openSession();
    transport.searches.push(["info depth 0 score mate 0", "bestmove (none)"]);

    const error = await session.analyze(FEN, { depth: 5, multiPv: 3 }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(NoLegalMovesError);
    expect(error).toMatchObject({ reason: "no-moves" });

    // the session stays usable
    transport.searches.push(["info depth 1 score cp 12 pv g1f3", "bestmove g1f3"]);
    expect(await session.analyze(FEN, { depth: 1, multiPv: 1 })).toEqual([
      { uci: "g1f3", score: 12, depth: 1, pv: "g1f3" },
    ]);
  });

  it("serializes overlapping searches", async () => {
    const { session, transport } = await openSession();
    transport.autoRespond = false;
    transport.searches.push(
      ["info depth 1 score cp 5 pv a2a3", "bestmove a2a3"],
      ["info depth 1 score cp 7 pv h2h3", "bestmove h2h3"]
    );

    const first = session.analyze("fen-one", { depth: 1, multiPv: 1 });
    const second = session.analyze("fen-two", { depth: 1, multiPv: 1 });
    await flush();
    expect(transport.sent.filter((c) => c.startsWith("position"))).toEqual(["position fen fen-one"]);

    transport.respond();
    expect((await first)[0].uci).toBe("a2a3");
    await flush();
    expect(transport.sent.filter((c) => c.startsWith("position"))).toEqual([
      "position fen fen-one",
      "position fen fen-two",
    ]);

    transport.respond();
    expect((await second)[0].uci).toBe("h2h3");
  });

  it("rejects pending and later searches when the engine exits", async () => {
    const { session, transport } = await openSession();
    transport.autoRespond = false;

    const pending = session.analyze(FEN, { depth: 10, multiPv: 1 });
    await flush();
    transport.crash(new Error("segfault"));

    await expect(pending).rejects.toThrow("Engine exited: segfault");
    await expect(session.analyze(FEN, { depth: 10, multiPv: 1 })).rejects.toBeInstanceOf(
      EngineUnavailableError
    );
  });

  it("sends quit and closes the transport on dispose", async () => {
    const { session, transport } = await openSession();
    session.dispose();
    expect(transport.sent[transport.sent.length - 1]).toBe("quit");
    expect(transport.closed).toBe(true);
    await expect(session.analyze(FEN, { depth: 1, multiPv: 1 })).rejects.toThrow(
      "Engine session closed"
    );
  });
});
