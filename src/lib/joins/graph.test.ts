import { describe, expect, it } from "vitest";
import { SemanticContractError } from "@/lib/semantic/errors";
import { model } from "@/test/fixtures";
import { JoinGraph } from "./graph";
import { buildSemanticIndex } from "./semantic-index";

const rentals = model("rental_orders", { primary: "rental", foreign: ["user", "facility"] });
const users = model("users", { primary: "user", foreign: ["region"] });
const facilities = model("facilities", { primary: "facility" });
const regions = model("regions", { primary: "region" });
const countries = model("countries", { primary: "country" });

describe("JoinGraph", () => {
  it("records the base model and entity at hop 0", () => {
    const graph = JoinGraph.fromModels("user", [rentals, users, regions]);

    expect(graph.baseModel?.name).toBe("users");
    expect(graph.getHopCount("users")).toBe(0);
    expect(graph.getEntityHopCount("user")).toBe(0);
  });

  it("follows foreign keys breadth-first", () => {
    const graph = JoinGraph.fromModels("rental", [rentals, users, facilities, regions]);

    expect(graph.getReachableModels()).toEqual(
      new Map([
        ["rental_orders", 0],
        ["users", 1],
        ["facilities", 1],
        ["regions", 2],
      ])
    );
    expect(graph.reachableEntities).toEqual(
      new Map([
        ["rental", 0],
        ["user", 1],
        ["facility", 1],
        ["region", 2],
      ])
    );
    expect(graph.steps).toEqual([
      { from: "rental_orders", to: "users", entity: "user", hops: 1 },
      { from: "rental_orders", to: "facilities", entity: "facility", hops: 1 },
      { from: "users", to: "regions", entity: "region", hops: 2 },
    ]);
  });

  it("records the shortest path when a model is reachable two ways", () => {
    // orders -> customers -> regions, and orders -> regions directly
    const orders = model("orders", { primary: "order", foreign: ["customer", "region"] });
    const customers = model("customers", { primary: "customer", foreign: ["region"] });

    const graph = JoinGraph.fromModels("order", [orders, customers, regions], 3);

    expect(graph.getHopCount("regions")).toBe(1);
    expect(graph.steps.filter((s) => s.to === "regions")).toEqual([
      { from: "orders", to: "regions", entity: "region", hops: 1 },
    ]);
  });

  it("terminates on cycles and lists each model once", () => {
    const a = model("a", { primary: "a_id", foreign: ["b_id"] });
    const b = model("b", { primary: "b_id", foreign: ["c_id"] });
    const c = model("c", { primary: "c_id", foreign: ["a_id"] });

    const graph = JoinGraph.fromModels("a_id", [a, b, c], 10);

    expect(graph.getReachableModels()).toEqual(
      new Map([
        ["a", 0],
        ["b", 1],
        ["c", 2],
      ])
    );
    expect(graph.steps).toHaveLength(2);
  });

  it("stops at maxHops", () => {
    const chain = [
      model("m0", { primary: "e0", foreign: ["e1"] }),
      model("m1", { primary: "e1", foreign: ["e2"] }),
      model("m2", { primary: "e2", foreign: ["e3"] }),
      model("m3", { primary: "e3", foreign: ["e4"] }),
      model("m4", { primary: "e4" }),
    ];

    for (const maxHops of [1, 2, 3]) {
      const graph = JoinGraph.fromModels("e0", chain, maxHops);
      const hops = [...graph.reachableModels.values()];
      expect(Math.max(...hops)).toBe(maxHops);
      expect(graph.reachableModels.size).toBe(maxHops + 1);
    }
    expect(JoinGraph.fromModels("e0", chain).isModelReachable("m3")).toBe(false);
  });

  it("ignores foreign keys that no model declares as primary", () => {
    const graph = JoinGraph.fromModels("rental", [rentals, users]);

    expect(graph.isModelReachable("users")).toBe(true);
    expect(graph.isEntityReachable("facility")).toBe(false);
    expect(graph.getEntityHopCount("facility")).toBeUndefined();
  });

  it("is empty for an unknown base entity", () => {
    const graph = JoinGraph.fromModels("ghost", [rentals, users]);

    expect(graph.baseModel).toBeUndefined();
    expect(graph.isEmpty()).toBe(true);
    expect(graph.getHopCount("users")).toBeUndefined();
    expect(graph.steps).toEqual([]);
  });

  it("is empty for a model set with no primary entities", () => {
    const graph = JoinGraph.fromModels("user", [countries, model("loose", { foreign: ["user"] })]);
    expect(graph.isEmpty()).toBe(true);
  });

  it("builds the same mappings from the same index", () => {
    const index = buildSemanticIndex([rentals, users, facilities, regions]);
    const first = new JoinGraph("rental", index);
    const second = new JoinGraph("rental", index);

    expect(second.getReachableModels()).toEqual(first.getReachableModels());
    expect(second.reachableEntities).toEqual(first.reachableEntities);
  });

  it("returns a copy from getReachableModels", () => {
    const graph = JoinGraph.fromModels("user", [users, regions]);
    const copy = graph.getReachableModels();
    copy.set("countries", 1);

    expect(graph.isModelReachable("countries")).toBe(false);
  });

  it.each([0, -1, 1.5, Number.NaN])("rejects maxHops %s", (maxHops) => {
    expect(() => JoinGraph.fromModels("user", [users], maxHops)).toThrow(SemanticContractError);
  });
});
