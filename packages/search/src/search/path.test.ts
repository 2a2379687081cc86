import { describe, it, expect } from "vitest";
import { Path } from "./path.js";

describe("Path", () => {
  it("starts at the starting node with distance 0", () => {
    const path = Path.startingAt("A");

    expect(path.to).toBe("A");
    expect(path.from).toBe("A");
    expect(path.distance).toBe(0);
    expect(path.length).toBe(0);
    expect(path.nodes()).toEqual([{ node: "A", distance: 0 }]);
    expect(path.toString()).toBe("A");
  });

  it("accumulates distances as it is extended", () => {
    const path = Path.startingAt("A").extendTo("B", 2).extendTo("C", 3);

    expect(path.to).toBe("C");
    expect(path.from).toBe("A");
    expect(path.distance).toBe(5);
    expect(path.length).toBe(2);
    expect(path.nodes()).toEqual([
      { node: "A", distance: 0 },
      { node: "B", distance: 2 },
      { node: "C", distance: 5 },
    ]);
    expect(path.toArray()).toEqual(["A", "B", "C"]);
    expect(path.toString()).toBe("A->B->C");
  });

  it("extending leaves the original path untouched", () => {
    const base = Path.startingAt("A").extendTo("B", 1);
    const viaC = base.extendTo("C", 1);
    const viaD = base.extendTo("D", 4);

    expect(base.toString()).toBe("A->B");
    expect(base.distance).toBe(1);
    expect(viaC.toString()).toBe("A->B->C");
    expect(viaC.distance).toBe(2);
    expect(viaD.toString()).toBe("A->B->D");
    expect(viaD.distance).toBe(5);
  });

  it("builds a fresh node list on every call", () => {
    const path = Path.startingAt(1).extendTo(2, 0.5);
    const first = path.nodes();
    first.pop();

    expect(path.nodes()).toEqual([
      { node: 1, distance: 0 },
      { node: 2, distance: 0.5 },
    ]);
  });
});
