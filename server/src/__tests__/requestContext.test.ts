import { describe, expect, it } from "vitest";

import { RequestContext } from "../audit/requestContext.js";
import { adminActor, techActor } from "./fixtures.js";

function tick(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("RequestContext", () => {
  it("has no actor outside a scope and ignores set there", () => {
    const context = new RequestContext();
    context.set(adminActor);
    expect(context.get()).toBeNull();
  });

  it("keeps concurrent scopes apart across awaits", async () => {
    const context = new RequestContext();

    const seen = await Promise.all([
      context.run(async () => {
        context.set(adminActor);
        await tick(10);
        return context.get();
      }),
      context.run(async () => {
        await tick(1);
        context.set(techActor);
        await tick(1);
        return context.get();
      }),
      context.run(async () => {
        await tick(5);
        return context.get();
      }),
    ]);

    expect(seen).toEqual([adminActor, techActor, null]);
  });

  it("clears the actor with clear() or the end callback", async () => {
    const context = new RequestContext();

    const afterClear = context.run(() => {
      context.set(adminActor);
      context.clear();
      return context.get();
    });
    expect(afterClear).toBeNull();

    let end: () => void = () => undefined;
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const observed = context.run(async (done) => {
      end = done;
      context.set(techActor);
      const before = context.get();
      await gate;
      return [before, context.get()];
    });

    end();
    release();
    expect(await observed).toEqual([techActor, null]);
  });
});
