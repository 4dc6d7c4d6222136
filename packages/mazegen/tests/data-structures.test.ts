/**
 * WorkList and CoordSet unit tests
 */

import { describe, expect, it } from "vitest";
import { CoordSet, cellFromIndex, cellIndex, WorkList } from "../src";

describe("WorkList", () => {
  it("drains as a stack from the tail", () => {
    const work = WorkList.from([1, 2, 3]);
    expect(work.takeLast()).toBe(3);
    expect(work.takeLast()).toBe(2);
    work.add(4);
    expect(work.takeLast()).toBe(4);
    expect(work.takeLast()).toBe(1);
    expect(work.takeLast()).toBeUndefined();
    expect(work.isEmpty).toBe(true);
  });

  it("drains as a queue from the head", () => {
    const work = WorkList.from(["a", "b"]);
    work.add("c");
    expect(work.takeFirst()).toBe("a");
    expect(work.length).toBe(2);
    expect(work.takeFirst()).toBe("b");
    expect(work.takeFirst()).toBe("c");
    expect(work.takeFirst()).toBeUndefined();
  });

  it("mixes both ends", () => {
    const work = WorkList.from([1, 2, 3, 4]);
    expect(work.takeFirst()).toBe(1);
    expect(work.takeLast()).toBe(4);
    expect(work.takeFirst()).toBe(2);
    expect(work.takeLast()).toBe(3);
    expect(work.isEmpty).toBe(true);
  });

  it("keeps order across compaction", () => {
    const work = new WorkList<number>();
    for (let i = 0; i < 5000; i++) work.add(i);
    for (let i = 0; i < 4000; i++) expect(work.takeFirst()).toBe(i);
    expect(work.length).toBe(1000);
    expect(work.takeFirst()).toBe(4000);
    expect(work.takeLast()).toBe(4999);
  });
});

describe("CoordSet", () => {
  it("tracks membership and size", () => {
    const set = new CoordSet(40, 3);
    expect(set.add(39, 2)).toBe(true);
    expect(set.add(39, 2)).toBe(false);
    expect(set.add(0, 0)).toBe(true);
    expect(set.has(39, 2)).toBe(true);
    expect(set.has(38, 2)).toBe(false);
    expect(set.size).toBe(2);

    set.delete(39, 2);
    expect(set.has(39, 2)).toBe(false);
    expect(set.size).toBe(1);

    set.clear();
    expect(set.size).toBe(0);
    expect(set.has(0, 0)).toBe(false);
  });
});

describe("cellIndex", () => {
  it("round-trips row-major indices", () => {
    expect(cellIndex(5, 10, 100)).toBe(1005);
    expect(cellFromIndex(1005, 100)).toEqual({ x: 5, y: 10 });
  });
});
