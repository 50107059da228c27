// packages/server/src/tests/supervisor.test.ts

import assert from "assert";
import { test } from "node:test";
import { makeEmptyBoard, makeSnapshot } from "ttt-rules";
import type { SessionRegistry } from "../registry";
import { FakeConnection, makeHarness, sleep } from "./helpers";

type Harness = ReturnType<typeof makeHarness>;

function recordOf(registry: SessionRegistry, id: string) {
  const handle = registry.get(id);
  if (!handle) throw new Error(`session ${id} is not registered`);
  return handle.record;
}

function nextTick() {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

async function seatBoth(h: Harness, sessionId = "abc") {
  const alice = h.connect("alice");
  const bob = h.connect("bob");
  await h.supervisor.handleMessage(alice, { type: "join", sessionId, name: "Alice" });
  await h.supervisor.handleMessage(bob, { type: "join", sessionId, name: "Bob" });
  return { alice, bob };
}

async function move(h: Harness, connection: FakeConnection, cellIndex: number) {
  const result = await h.supervisor.handleMessage(connection, { type: "move", cellIndex });
  assert.equal(result.ok, true, `move ${cellIndex} by ${connection.id} should be accepted`);
  return result;
}

test("two players finish a game and reset it with scores kept", async () => {
  const h = makeHarness();
  const alice = h.connect("alice");
  const bob = h.connect("bob");

  const first = await h.supervisor.handleMessage(alice, {
    type: "join",
    sessionId: "abc",
    name: "Alice",
  });
  assert.deepEqual(first, { ok: true, sessionId: "abc", role: "X", revision: 1 });
  assert.deepEqual(alice.ofType("joined"), [
    { type: "joined", sessionId: "abc", role: "X", name: "Alice", reconnected: false },
  ]);
  assert.equal(alice.lastSnapshot().status, "waiting");

  const second = await h.supervisor.handleMessage(bob, {
    type: "join",
    sessionId: "abc",
    name: "Bob",
  });
  assert.deepEqual(second, { ok: true, sessionId: "abc", role: "O", revision: 2 });
  assert.equal(bob.sent[0]?.type, "joined");
  assert.equal(bob.lastSnapshot().status, "inProgress");
  assert.equal(bob.lastSnapshot().turn, "X");

  await move(h, alice, 0);
  await move(h, bob, 3);
  await move(h, alice, 1);
  await move(h, bob, 4);
  await move(h, alice, 2);

  const final = alice.lastSnapshot();
  assert.deepEqual(final.board, ["X", "X", "X", "O", "O", null, null, null, null]);
  assert.equal(final.status, "finished");
  assert.equal(final.winner, "X");
  assert.deepEqual(final.scores, { X: 1, O: 0 });
  assert.equal(final.revision, 7);
  assert.deepEqual(bob.lastSnapshot(), final);

  const afterReset = await h.supervisor.handleMessage(bob, { type: "reset" });
  assert.deepEqual(afterReset, { ok: true, sessionId: "abc", role: "O", revision: 8 });
  const fresh = alice.lastSnapshot();
  assert.deepEqual(fresh.board, makeEmptyBoard());
  assert.equal(fresh.turn, "X");
  assert.equal(fresh.status, "inProgress");
  assert.equal(fresh.winner, null);
  assert.deepEqual(fresh.scores, { X: 1, O: 0 });

  assert.deepEqual(
    alice.snapshots().map((snapshot) => snapshot.revision),
    [1, 2, 3, 4, 5, 6, 7, 8]
  );
  assert.deepEqual(
    bob.snapshots().map((snapshot) => snapshot.revision),
    [2, 3, 4, 5, 6, 7, 8]
  );
  h.supervisor.dispose();
});

test("a rejected move reaches only the player who sent it", async () => {
  const h = makeHarness();
  const { alice, bob } = await seatBoth(h);
  const aliceSeen = alice.sent.length;

  const result = await h.supervisor.handleMessage(bob, { type: "move", cellIndex: 4 });
  assert.deepEqual(result, { ok: false, code: "NOT_YOUR_TURN", message: "It is X's turn" });
  assert.deepEqual(bob.ofType("rejected"), [
    { type: "rejected", code: "NOT_YOUR_TURN", message: "It is X's turn" },
  ]);
  assert.equal(alice.sent.length, aliceSeen);
  assert.equal(recordOf(h.registry, "abc").revision, 2);

  await move(h, alice, 4);
  const occupied = await h.supervisor.handleMessage(bob, { type: "move", cellIndex: 4 });
  assert.equal(occupied.ok, false);
  assert.equal(!occupied.ok && occupied.code, "CELL_OCCUPIED");

  const outOfBounds = await h.supervisor.handleMessage(bob, { type: "move", cellIndex: 9 });
  assert.equal(!outOfBounds.ok && outOfBounds.code, "INVALID_CELL");
  assert.equal(recordOf(h.registry, "abc").revision, 3);
  h.supervisor.dispose();
});

test("commands before joining are answered with NOT_JOINED", async () => {
  const h = makeHarness();
  const carol = h.connect("carol");

  const result = await h.supervisor.handleMessage(carol, { type: "move", cellIndex: 0 });
  assert.deepEqual(result, {
    ok: false,
    code: "NOT_JOINED",
    message: "Must join a session first",
  });
  assert.deepEqual(carol.ofType("error"), [
    { type: "error", code: "NOT_JOINED", message: "Must join a session first" },
  ]);

  const detached = new FakeConnection("ghost");
  const bound = await h.supervisor.bind(detached, "abc", "Ghost");
  assert.deepEqual(bound, {
    ok: false,
    code: "NOT_JOINED",
    message: "Connection is not attached",
  });
  assert.equal(h.registry.has("abc"), false);
  h.supervisor.dispose();
});

test("a third player is turned away while both players are connected", async () => {
  const h = makeHarness();
  const { alice } = await seatBoth(h);
  const aliceSeen = alice.sent.length;
  const carol = h.connect("carol");

  const result = await h.supervisor.handleMessage(carol, {
    type: "join",
    sessionId: "abc",
    name: "Carol",
  });
  assert.deepEqual(result, { ok: false, code: "SESSION_FULL", message: "Both roles are taken" });
  assert.deepEqual(carol.ofType("rejected"), [
    { type: "rejected", code: "SESSION_FULL", message: "Both roles are taken" },
  ]);
  assert.equal(carol.snapshots().length, 0);
  assert.equal(alice.sent.length, aliceSeen);
  assert.equal(h.supervisor.bindingOf(carol), null);
  h.supervisor.dispose();
});

test("a reconnecting player sees every move made while away", async () => {
  const h = makeHarness();
  const { alice, bob } = await seatBoth(h);

  await move(h, alice, 4);
  await h.supervisor.detach(alice, "close");
  assert.deepEqual(bob.lastSnapshot().roles.X, { name: "Alice", connected: false });
  assert.equal(bob.lastSnapshot().revision, 4);

  await move(h, bob, 0);

  const aliceAgain = h.connect("alice-2");
  const result = await h.supervisor.handleMessage(aliceAgain, {
    type: "join",
    sessionId: "abc",
    name: "Alice",
  });
  assert.deepEqual(result, { ok: true, sessionId: "abc", role: "X", revision: 6 });
  assert.deepEqual(aliceAgain.ofType("joined"), [
    { type: "joined", sessionId: "abc", role: "X", name: "Alice", reconnected: true },
  ]);

  const seen = aliceAgain.lastSnapshot();
  assert.equal(seen.board[4], "X");
  assert.equal(seen.board[0], "O");
  assert.equal(seen.turn, "X");
  assert.deepEqual(seen.roles.X, { name: "Alice", connected: true });
  assert.deepEqual(seen, bob.lastSnapshot());

  const record = recordOf(h.registry, "abc");
  assert.deepEqual(seen, makeSnapshot(record.state, { revision: record.revision }));
  h.supervisor.dispose();
});

test("a late close from a replaced connection leaves the reclaimed slot alone", async () => {
  const h = makeHarness();
  const { alice } = await seatBoth(h);

  await h.supervisor.unbind(alice, "error");
  const aliceAgain = h.connect("alice-2");
  await h.supervisor.handleMessage(aliceAgain, {
    type: "join",
    sessionId: "abc",
    name: "Alice",
  });
  const before = recordOf(h.registry, "abc").revision;

  await h.supervisor.detach(alice, "close");

  const record = recordOf(h.registry, "abc");
  assert.equal(record.revision, before);
  assert.equal(record.state.players.X?.connId, "alice-2");
  assert.equal(h.supervisor.isAttached(alice), false);
  h.supervisor.dispose();
});

test("a disconnected slot is reserved for the grace period, then taken over", async () => {
  const h = makeHarness({ reconnectGraceMs: 45_000 });
  const { alice, bob } = await seatBoth(h);
  await move(h, alice, 0);
  await h.supervisor.detach(alice, "close");
  const carol = h.connect("carol");

  h.advance(44_999);
  const early = await h.supervisor.handleMessage(carol, {
    type: "join",
    sessionId: "abc",
    name: "Carol",
  });
  assert.equal(!early.ok && early.code, "SESSION_FULL");

  h.advance(1);
  const late = await h.supervisor.handleMessage(carol, {
    type: "join",
    sessionId: "abc",
    name: "Carol",
  });
  assert.equal(late.ok && late.role, "X");
  assert.deepEqual(carol.ofType("joined").pop(), {
    type: "joined",
    sessionId: "abc",
    role: "X",
    name: "Carol",
    reconnected: false,
  });
  const seen = bob.lastSnapshot();
  assert.deepEqual(seen.roles.X, { name: "Carol", connected: true });
  assert.equal(seen.board[0], "X");
  assert.equal(seen.status, "inProgress");
  h.supervisor.dispose();
});

test("a failed send unbinds only that player", async () => {
  const h = makeHarness();
  const { alice, bob } = await seatBoth(h);
  bob.failSends = true;

  await move(h, alice, 4);
  assert.equal(alice.lastSnapshot().revision, 3);
  assert.deepEqual(bob.closedWith, { code: 1011, reason: "send_failed" });

  await h.flush("abc");
  const record = recordOf(h.registry, "abc");
  assert.equal(record.state.players.O?.connId, null);
  assert.equal(h.supervisor.isAttached(bob), false);
  assert.equal(alice.lastSnapshot().revision, 4);
  assert.deepEqual(alice.lastSnapshot().roles.O, { name: "Bob", connected: false });
  assert.equal(h.supervisor.bindingOf(alice)?.role, "X");
  h.supervisor.dispose();
});

test("a subscriber that stops draining is disconnected instead of skipped", async () => {
  const h = makeHarness({ maxBufferedBytes: 1024 });
  const { alice, bob } = await seatBoth(h);
  bob.bufferedAmount = 4096;

  await move(h, alice, 4);
  assert.deepEqual(bob.closedWith, { code: 1011, reason: "slow_consumer" });
  assert.equal(bob.lastSnapshot().revision, 2);
  assert.equal(alice.lastSnapshot().revision, 3);

  await h.flush("abc");
  assert.equal(recordOf(h.registry, "abc").state.players.O?.connId, null);
  h.supervisor.dispose();
});

test("a silent connection is closed after the idle timeout", async () => {
  const h = makeHarness({ idleTimeoutMs: 80 });
  const { alice, bob } = await seatBoth(h);

  const keepAlive = setInterval(() => h.supervisor.touch(bob), 10);
  try {
    await sleep(250);
  } finally {
    clearInterval(keepAlive);
  }

  assert.deepEqual(alice.closedWith, { code: 4000, reason: "idle timeout" });
  assert.equal(bob.closedWith, null);

  await h.flush("abc");
  assert.equal(h.supervisor.isAttached(alice), false);
  assert.equal(h.supervisor.isAttached(bob), true);
  const record = recordOf(h.registry, "abc");
  assert.equal(record.state.players.X?.connId, null);
  assert.equal(record.state.players.X?.name, "Alice");
  h.supervisor.dispose();
});

test("an invariant violation closes the offending connection and keeps the session", async () => {
  const h = makeHarness();
  const { alice, bob } = await seatBoth(h);
  const record = recordOf(h.registry, "abc");
  record.state = { ...record.state, scores: { X: -1, O: 0 } };
  const bobSeen = bob.sent.length;

  const result = await h.supervisor.handleMessage(alice, { type: "reset" });
  assert.deepEqual(result, {
    ok: false,
    code: "INTERNAL",
    message: "session abc: score for X is -1",
  });
  assert.deepEqual(alice.closedWith, { code: 1011, reason: "internal error" });
  assert.equal(record.revision, 2);
  assert.equal(bob.sent.length, bobSeen);

  await h.flush("abc");
  assert.equal(h.supervisor.isAttached(alice), false);
  assert.deepEqual(h.supervisor.bindingOf(bob), { sessionId: "abc", role: "O", name: "Bob" });
  assert.equal(h.registry.has("abc"), true);
  h.supervisor.dispose();
});

test("joining another session releases the previous slot", async () => {
  const h = makeHarness();
  const alice = h.connect("alice");
  await h.supervisor.handleMessage(alice, { type: "join", sessionId: "abc", name: "Alice" });

  const result = await h.supervisor.handleMessage(alice, {
    type: "join",
    sessionId: "xyz",
    name: "Alice",
  });
  assert.deepEqual(result, { ok: true, sessionId: "xyz", role: "X", revision: 1 });
  assert.deepEqual(h.supervisor.bindingOf(alice), {
    sessionId: "xyz",
    role: "X",
    name: "Alice",
  });

  const previous = recordOf(h.registry, "abc");
  assert.equal(previous.state.players.X?.connId, null);
  assert.equal(previous.revision, 2);
  assert.equal(h.hub.subscribers("abc").length, 0);
  assert.equal(h.hub.subscribers("xyz").length, 1);
  h.supervisor.dispose();
});

test("leaving frees the role and the next reset waits for a new opponent", async () => {
  const h = makeHarness();
  const { alice, bob } = await seatBoth(h);

  const result = await h.supervisor.handleMessage(bob, { type: "leave" });
  assert.deepEqual(result, { ok: true, sessionId: "abc", role: "O", revision: 3 });
  assert.deepEqual(bob.ofType("left"), [{ type: "left", sessionId: "abc" }]);
  assert.equal(bob.lastSnapshot().revision, 2);
  assert.equal(h.supervisor.bindingOf(bob), null);
  assert.equal(alice.lastSnapshot().roles.O, null);

  await h.supervisor.handleMessage(alice, { type: "reset" });
  assert.equal(alice.lastSnapshot().status, "waiting");

  const blocked = await h.supervisor.handleMessage(alice, { type: "move", cellIndex: 0 });
  assert.equal(!blocked.ok && blocked.code, "WAITING_FOR_PLAYERS");

  const again = await h.supervisor.handleMessage(bob, { type: "leave" });
  assert.equal(!again.ok && again.code, "NOT_JOINED");
  h.supervisor.dispose();
});

test("a join that loses its session to the reaper retries on a fresh record", async () => {
  const h = makeHarness();
  const original = h.registry.getOrCreate("abc").record;
  let openGate: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    openGate = resolve;
  });
  const gated = h.registry.runExclusive("abc", () => gate);

  const alice = h.connect("alice");
  const joining = h.supervisor.bind(alice, "abc", "Alice");
  await nextTick();
  h.registry.remove("abc");
  openGate();
  await gated;

  const result = await joining;
  assert.deepEqual(result, { ok: true, sessionId: "abc", role: "X", revision: 1 });
  const current = recordOf(h.registry, "abc");
  assert.notEqual(current, original);
  assert.equal(current.state.players.X?.name, "Alice");
  assert.equal(original.state.players.X, null);
  h.supervisor.dispose();
});

test("a connection that closes while its join is queued is not seated", async () => {
  const h = makeHarness();
  h.registry.getOrCreate("abc");
  let openGate: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    openGate = resolve;
  });
  const gated = h.registry.runExclusive("abc", () => gate);

  const alice = h.connect("alice");
  const joining = h.supervisor.handleMessage(alice, {
    type: "join",
    sessionId: "abc",
    name: "Alice",
  });
  await nextTick();
  alice.close(1000, "bye");
  await h.supervisor.detach(alice, "close");
  openGate();
  await gated;

  assert.deepEqual(await joining, {
    ok: false,
    code: "NOT_JOINED",
    message: "Connection closed before joining",
  });
  assert.equal(recordOf(h.registry, "abc").state.players.X, null);
  h.supervisor.dispose();
});

test("a join and the command right after it are handled in arrival order", async () => {
  const h = makeHarness();
  const alice = h.connect("alice");

  const joining = h.supervisor.handleMessage(alice, {
    type: "join",
    sessionId: "abc",
    name: "Alice",
  });
  const resetting = h.supervisor.handleMessage(alice, { type: "reset" });

  assert.deepEqual(await joining, { ok: true, sessionId: "abc", role: "X", revision: 1 });
  assert.deepEqual(await resetting, { ok: true, sessionId: "abc", role: "X", revision: 2 });
  assert.equal(alice.ofType("error").length, 0);
  h.supervisor.dispose();
});

test("a reconnecting player can move without waiting for the join reply", async () => {
  const h = makeHarness();
  const { alice, bob } = await seatBoth(h);
  await h.supervisor.detach(alice, "close");

  const aliceAgain = h.connect("alice-2");
  const rejoining = h.supervisor.handleMessage(aliceAgain, {
    type: "join",
    sessionId: "abc",
    name: "Alice",
  });
  const moving = h.supervisor.handleMessage(aliceAgain, { type: "move", cellIndex: 4 });

  assert.deepEqual(await rejoining, { ok: true, sessionId: "abc", role: "X", revision: 4 });
  assert.deepEqual(await moving, { ok: true, sessionId: "abc", role: "X", revision: 5 });
  assert.equal(bob.lastSnapshot().board[4], "X");
  assert.equal(bob.lastSnapshot().turn, "O");
  h.supervisor.dispose();
});

test("names are matched exactly when reclaiming a slot", async () => {
  const h = makeHarness();
  const { alice } = await seatBoth(h);
  await h.supervisor.detach(alice, "close");

  const lookalike = h.connect("lookalike");
  const result = await h.supervisor.handleMessage(lookalike, {
    type: "join",
    sessionId: "abc",
    name: "Alice ",
  });
  assert.equal(!result.ok && result.code, "SESSION_FULL");
  assert.equal(recordOf(h.registry, "abc").state.players.X?.connId, null);
  h.supervisor.dispose();
});
