import { describe, it } from "node:test";
import assert from "node:assert";
import {
  CircularDependencyError,
  ComputedDepthError,
  ComputedDisposedError,
  CrossRuntimeReadError,
  Owner,
  TooManySubscribersError,
  type Computed,
} from "../src/signals/index.js";
import { createRuntime } from "./helpers.js";

describe("Computed", () => {
  it("should derive a value from signals", () => {
    const { runtime } = createRuntime();
    const a = runtime.signal(2);
    const b = runtime.signal(3);
    const sum = runtime.computed(() => a.get() + b.get());
    assert.strictEqual(sum.get(), 5);
    assert.strictEqual(sum.value, 5);
  });

  it("should follow the width/height/area sequence with three runs", () => {
    const { runtime } = createRuntime();
    const width = runtime.signal(10);
    const height = runtime.signal(5);
    let runs = 0;
    const area = runtime.computed(() => {
      runs++;
      return width.get() * height.get();
    });

    assert.strictEqual(area.get(), 50);
    width.set(20);
    assert.strictEqual(area.get(), 100);
    height.set(8);
    assert.strictEqual(area.get(), 160);
    assert.strictEqual(runs, 3);
  });

  describe("laziness", () => {
    it("should run once at construction and not again without a change", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(1);
      let runs = 0;
      const c = runtime.computed(() => {
        runs++;
        return a.get() * 2;
      });
      assert.strictEqual(runs, 1);
      c.get();
      c.get();
      c.peek();
      assert.strictEqual(runs, 1);
    });

    it("should not recompute until read", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(1);
      let runs = 0;
      const c = runtime.computed(() => {
        runs++;
        return a.get();
      });
      a.set(2);
      assert.strictEqual(c.isDirty(), true);
      assert.strictEqual(runs, 1);
      assert.strictEqual(c.get(), 2);
      assert.strictEqual(c.isDirty(), false);
      assert.strictEqual(runs, 2);
    });

    it("should recompute at most once for many changes", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(0);
      let runs = 0;
      const c = runtime.computed(() => {
        runs++;
        return a.get();
      });
      for (let i = 1; i <= 10; i++) a.set(i);
      assert.strictEqual(c.get(), 10);
      assert.strictEqual(c.get(), 10);
      assert.strictEqual(runs, 2);
    });

    it("should stay dirty when a dependency changes during its recompute", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(0);
      let runs = 0;
      const c = runtime.computed(() => {
        runs++;
        const value = a.get();
        // The second run bumps a dependency it has already read
        if (runs === 2) a.set(value + 1);
        return value;
      });
      a.set(1);

      assert.strictEqual(c.get(), 1);
      assert.strictEqual(runs, 2);
      assert.strictEqual(c.isDirty(), true);

      assert.strictEqual(c.get(), 2);
      assert.strictEqual(runs, 3);
      assert.strictEqual(c.isDirty(), false);
      assert.strictEqual(c.get(), 2);
      assert.strictEqual(runs, 3);
    });
  });

  describe("dependencies", () => {
    it("should follow branches", () => {
      const { runtime } = createRuntime();
      const flag = runtime.signal(true);
      const a = runtime.signal("a");
      const b = runtime.signal("b");
      const c = runtime.computed(() => (flag.get() ? a.get() : b.get()));

      assert.strictEqual(c.dependencies.size, 2);
      assert.ok(c.dependencies.has(a.id));
      assert.ok(!c.dependencies.has(b.id));

      flag.set(false);
      assert.strictEqual(c.get(), "b");
      assert.strictEqual(c.dependencies.size, 2);
      assert.ok(c.dependencies.has(flag.id));
      assert.ok(c.dependencies.has(b.id));
      assert.strictEqual(runtime.registry.subscriberCount(a.id), 0);

      // a is no longer a dependency
      a.set("a2");
      assert.strictEqual(c.isDirty(), false);

      b.set("b2");
      assert.strictEqual(c.isDirty(), true);
      assert.strictEqual(c.get(), "b2");
    });

    it("should refuse to depend on a signal of another runtime", () => {
      const { runtime } = createRuntime();
      const { runtime: other } = createRuntime();
      const foreign = other.signal(1);
      assert.throws(
        () => runtime.computed(() => foreign.get()),
        CrossRuntimeReadError,
      );
      assert.strictEqual(runtime.registry.size, 0);

      const snapshot = runtime.computed(() =>
        other.untracked(() => foreign.get()),
      );
      assert.strictEqual(snapshot.get(), 1);
      assert.strictEqual(snapshot.dependencies.size, 0);
    });

    it("should keep one subscription per dependency however often it is read", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(1);
      const c = runtime.computed(() => a.get() + a.get() + a.get());
      assert.strictEqual(c.get(), 3);
      assert.strictEqual(runtime.registry.subscriberCount(a.id), 1);
      a.set(2);
      assert.strictEqual(c.get(), 6);
      assert.strictEqual(runtime.registry.subscriberCount(a.id), 1);
    });

    it("should not track peek() or untracked reads", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(1);
      const b = runtime.signal(10);
      const d = runtime.signal(100);
      const c = runtime.computed(
        () => a.get() + b.peek() + runtime.untracked(() => d.get()),
      );
      assert.strictEqual(c.get(), 111);
      assert.deepStrictEqual([...c.dependencies], [a.id]);

      b.set(20);
      d.set(200);
      assert.strictEqual(c.isDirty(), false);
      assert.strictEqual(c.get(), 111);
    });

    it("should record reads made through the scope it is given", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(1);
      const b = runtime.signal(2);
      const c = runtime.computed(
        (scope) => a.getTracked(scope) * b.getTracked(scope),
      );
      assert.strictEqual(c.get(), 2);
      assert.strictEqual(c.dependencies.size, 2);
      b.set(5);
      assert.strictEqual(c.get(), 5);
    });

    it("should keep the outer capture when a computed is created inside another", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(1);
      const b = runtime.signal(2);
      const outer = runtime.computed(() => {
        const inner = runtime.computed(() => b.get() * 10);
        return inner.get() + a.get();
      });
      assert.strictEqual(outer.get(), 21);
      assert.strictEqual(outer.dependencies.size, 2);
      assert.ok(outer.dependencies.has(a.id));
      assert.ok(!outer.dependencies.has(b.id));
    });
  });

  describe("chains", () => {
    it("should propagate through computeds, recomputing each once", () => {
      const { runtime } = createRuntime();
      const s = runtime.signal(1);
      let d1Runs = 0;
      let d2Runs = 0;
      const d1 = runtime.computed(() => {
        d1Runs++;
        return s.get() * 2;
      });
      const d2 = runtime.computed(() => {
        d2Runs++;
        return d1.get() + 1;
      });
      assert.strictEqual(d2.get(), 3);

      s.set(5);
      assert.strictEqual(d1.isDirty(), true);
      assert.strictEqual(d2.isDirty(), true);
      assert.strictEqual(d2.get(), 11);
      assert.strictEqual(d1.get(), 10);
      assert.strictEqual(d1Runs, 2);
      assert.strictEqual(d2Runs, 2);
    });

    it("should handle a diamond", () => {
      const { runtime } = createRuntime();
      const s = runtime.signal(1);
      const left = runtime.computed(() => s.get() + 1);
      const right = runtime.computed(() => s.get() * 10);
      let runs = 0;
      const bottom = runtime.computed(() => {
        runs++;
        return left.get() + right.get();
      });
      s.set(2);
      assert.strictEqual(bottom.get(), 23);
      assert.strictEqual(runs, 2);
    });

    it("should bound how many computeds evaluate inside one another", () => {
      const { runtime } = createRuntime({ maxComputedDepth: 2 });
      const s = runtime.signal(1);
      const c1 = runtime.computed(() => s.get());
      const c2 = runtime.computed(() => c1.get());
      const c3 = runtime.computed(() => c2.get());

      s.set(2);
      assert.throws(() => c3.get(), ComputedDepthError);
      assert.strictEqual(runtime.tracker.depth, 0);
      assert.strictEqual(c3.isDirty(), true);
      assert.strictEqual(c2.isDirty(), true);
      // Reading closer to the source stays within the limit
      assert.strictEqual(c2.get(), 2);
      assert.strictEqual(c1.get(), 2);
    });
  });

  describe("batching", () => {
    it("should read fresh values inside a batch", () => {
      const { runtime } = createRuntime();
      const width = runtime.signal(2);
      const height = runtime.signal(3);
      const area = runtime.computed(() => width.get() * height.get());
      runtime.batch(() => {
        width.set(4);
        height.set(5);
        assert.strictEqual(area.get(), 20);
      });
      assert.strictEqual(area.get(), 20);
    });

    it("should notify its subscribers once per batch", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(1);
      const b = runtime.signal(2);
      const sum = runtime.computed(() => a.get() + b.get());
      const seen: number[] = [];
      sum.subscribe(() => seen.push(sum.get()));

      runtime.batch(() => {
        a.set(10);
        b.set(20);
        assert.deepStrictEqual(seen, []);
      });
      assert.deepStrictEqual(seen, [30]);

      a.set(11);
      assert.deepStrictEqual(seen, [30, 31]);
    });
  });

  describe("errors", () => {
    it("should reject reading itself on every attempt", () => {
      const { runtime } = createRuntime();
      const trigger = runtime.signal(0);
      let holder: Computed<number> | undefined;
      const c = runtime.computed(() => {
        trigger.get();
        return holder ? holder.get() + 1 : 0;
      });
      holder = c;
      trigger.set(1);

      for (let attempt = 0; attempt < 3; attempt++) {
        assert.throws(
          () => c.get(),
          (error: unknown) => {
            assert.ok(error instanceof CircularDependencyError);
            assert.strictEqual(error.computedId, c.id);
            return true;
          },
        );
      }
      assert.strictEqual(runtime.tracker.depth, 0);
      assert.strictEqual(runtime.tracker.isTracking, false);
    });

    it("should reject a cycle between two computeds", () => {
      const { runtime } = createRuntime();
      const trigger = runtime.signal(false);
      let second: Computed<number> | undefined;
      const first = runtime.computed(() =>
        trigger.get() && second ? second.get() : 0,
      );
      second = runtime.computed(() => first.get() + 1);
      trigger.set(true);
      assert.throws(() => first.get(), CircularDependencyError);
      assert.throws(() => first.get(), CircularDependencyError);
    });

    it("should retry after the compute function throws", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(1);
      let runs = 0;
      const c = runtime.computed(() => {
        runs++;
        const v = a.get();
        if (v < 0) throw new Error("negative");
        return v;
      });

      a.set(-1);
      assert.throws(() => c.get(), /negative/);
      assert.strictEqual(c.isDirty(), true);
      assert.throws(() => c.get(), /negative/);
      assert.strictEqual(runs, 3);

      a.set(2);
      assert.strictEqual(c.get(), 2);
      assert.strictEqual(c.isDirty(), false);
    });

    it("should propagate a throw from the first evaluation", () => {
      const { runtime } = createRuntime();
      const before = runtime.registry.size;
      assert.throws(
        () =>
          runtime.computed(() => {
            throw new Error("bad start");
          }),
        /bad start/,
      );
      assert.strictEqual(runtime.registry.size, before);
    });

    it("should roll back every subscription when one is refused", () => {
      const { runtime, log } = createRuntime({ maxSubscribersPerSignal: 1 });
      const free = runtime.signal(1);
      const full = runtime.signal(2);
      full.subscribe(() => {});
      const before = runtime.registry.size;

      assert.throws(
        () => runtime.computed(() => free.get() + full.get()),
        TooManySubscribersError,
      );
      assert.strictEqual(runtime.registry.subscriberCount(free.id), 0);
      assert.strictEqual(runtime.registry.subscriberCount(full.id), 1);
      assert.strictEqual(runtime.registry.size, before);

      const [message] = log.messages("error");
      assert.ok(message?.startsWith("[computed] Failed to subscribe Computed("));
      assert.ok(
        message?.endsWith(
          "to its dependencies. Rolling back all subscriptions.",
        ),
      );
    });

    it("should keep its old dependencies when a new one is refused", () => {
      const { runtime } = createRuntime({ maxSubscribersPerSignal: 1 });
      const flag = runtime.signal(true);
      const a = runtime.signal(1);
      const full = runtime.signal(2);
      const blocker = full.subscribe(() => {});
      const c = runtime.computed(() => (flag.get() ? a.get() : full.get()));

      flag.set(false);
      assert.throws(() => c.get(), TooManySubscribersError);
      assert.strictEqual(c.dependencies.size, 2);
      assert.ok(c.dependencies.has(a.id));
      assert.strictEqual(c.isDirty(), true);

      full.unsubscribe(blocker);
      assert.strictEqual(c.get(), 2);
      assert.ok(c.dependencies.has(full.id));
      assert.ok(!c.dependencies.has(a.id));
    });
  });

  describe("disposal", () => {
    it("should unsubscribe and drop its cell", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(1);
      const c = runtime.computed(() => a.get());
      const cell = c.signalId;

      c.dispose();
      assert.strictEqual(c.disposed, true);
      assert.strictEqual(runtime.registry.subscriberCount(a.id), 0);
      assert.strictEqual(runtime.registry.has(cell), false);
      assert.throws(() => c.get(), ComputedDisposedError);
      assert.doesNotThrow(() => c.dispose());
      assert.doesNotThrow(() => a.set(2));
    });

    it("should be disposed by its owner", () => {
      const { runtime } = createRuntime();
      const a = runtime.signal(1);
      const owner = new Owner();
      const c = runtime.computed(() => a.get()).owned(owner);
      owner.dispose();
      assert.strictEqual(c.disposed, true);
      assert.strictEqual(runtime.registry.subscriberCount(a.id), 0);
    });
  });

  describe("logging", () => {
    it("should log creation and dependency changes in debug mode", () => {
      const { runtime, log } = createRuntime({ debug: true });
      const flag = runtime.signal(true);
      const a = runtime.signal(1);
      const b = runtime.signal(2);
      const c = runtime.computed(() => (flag.get() ? a.get() : b.get()));
      flag.set(false);
      c.get();

      const messages = log
        .messages("debug")
        .filter((m) => m.startsWith("[computed]"));
      assert.deepStrictEqual(messages, [
        `[computed] Dependencies of ${c.id} changed: +2 -0 (now 2)`,
        `[computed] Created ${c.id} with 2 dependencies`,
        `[computed] Dependencies of ${c.id} changed: +1 -1 (now 2)`,
      ]);
    });
  });
});
