import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadSemanticProject } from "@/lib/semantic/io";
import type { Metric, SemanticModel } from "@/lib/semantic/types";
import { MetricValidationError } from "@/lib/validation/errors";
import { derivedMetric, model, ratioMetric, simpleMetric } from "@/test/fixtures";
import { EXPLORES_FILE, generateProject, MODEL_FILE, writeProject } from "./generator";

const rentals = model("rental_orders", {
  primary: "rental",
  foreign: ["user"],
  measures: ["gmv", "rental_count"],
});
const users = model("users", { primary: "user", measures: ["user_count"] });
const sessions = model("sessions", { primary: "session", measures: ["session_count"] });
const models = [rentals, users, sessions];

const metrics = [
  simpleMetric("total_gmv", "gmv", "rental"),
  ratioMetric("gmv_per_user", "gmv", "user_count", "rental"),
  simpleMetric("no_entity", "gmv"),
  derivedMetric("growth", "rental"),
  ratioMetric("sessions_per_user", "user_count", "session_count", "user"),
];

// Text of one explore block, up to its closing brace
function exploreBlock(explores: string, name: string): string {
  const start = explores.indexOf(`explore: ${name} {`);
  expect(start).toBeGreaterThanOrEqual(0);
  return explores.slice(start, explores.indexOf("\n}\n", start));
}

function joinFields(explore: string): string[] {
  return explore
    .split("\n")
    .filter((line) => line.trim().startsWith("fields: ["))
    .flatMap((line) => line.trim().slice("fields: [".length, -1).split(", "));
}

describe("generateProject", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes a view per model plus explores and model files", () => {
    const { files } = generateProject(models, metrics, { connection: "warehouse" });

    expect([...files.keys()]).toEqual([
      "rental_orders.view.lkml",
      "users.view.lkml",
      "sessions.view.lkml",
      EXPLORES_FILE,
      MODEL_FILE,
    ]);
    expect(files.get(MODEL_FILE)).toBe(
      'connection: "warehouse"\ninclude: "explores.lkml"\ninclude: "*.view.lkml"\n'
    );
    expect(files.get(EXPLORES_FILE)).toMatch(
      /^include: "rental_orders\.view\.lkml"\ninclude: "users\.view\.lkml"\ninclude: "sessions\.view\.lkml"\n\nexplore: rental_orders \{\n/
    );
  });

  it("renders valid metrics into the view owning their primary entity", () => {
    const { files } = generateProject(models, metrics);
    const view = files.get("rental_orders.view.lkml");

    expect(view).toContain(
      ["  measure: total_gmv {", "    type: number", "    sql: ${gmv_measure} ;;", "  }"].join("\n")
    );
    expect(view).toContain(
      "    sql: 1.0 * ${gmv_measure} / NULLIF(${users.user_count_measure}, 0) ;;"
    );
    expect(files.get("users.view.lkml")).not.toContain("measure: sessions_per_user");
  });

  it("skips metrics that failed validation or cannot be rendered", () => {
    const { validation, skippedMetrics } = generateProject(models, metrics);

    expect(validation.errors().map((i) => i.metricName)).toEqual(["no_entity", "sessions_per_user"]);
    expect(skippedMetrics).toEqual([
      { name: "no_entity", reason: "failed validation" },
      { name: "growth", reason: "derived metrics are not rendered" },
      { name: "sessions_per_user", reason: "failed validation" },
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      '[LookML] Skipping metric "growth": derived metrics are not rendered'
    );
  });

  it("exposes every cross-view field a metric reads through its owner's explore", async () => {
    const project = await loadSemanticProject([
      path.resolve(process.cwd(), "src/semantic/models"),
      path.resolve(process.cwd(), "src/semantic/metrics"),
    ]);
    const { files } = generateProject(project.models, project.metrics);
    const explores = files.get(EXPLORES_FILE) ?? "";

    expect(exploreBlock(explores, "rental_orders")).toContain(
      "    fields: [users.dimensions_only*, users.user_count_measure]"
    );

    let checked = 0;
    for (const model of project.models) {
      const view = files.get(`${model.name}.view.lkml`) ?? "";
      for (const [, joined, field] of view.matchAll(/\$\{(\w+)\.(\w+)\}/g)) {
        expect(joinFields(exploreBlock(explores, model.name))).toContain(`${joined}.${field}`);
        checked++;
      }
    }
    expect(checked).toBe(1);
  });

  it("renders filtered metrics over filtered copies of their measures", async () => {
    const project = await loadSemanticProject([
      path.resolve(process.cwd(), "src/semantic/models"),
      path.resolve(process.cwd(), "src/semantic/metrics"),
    ]);
    const { files, skippedMetrics } = generateProject(project.models, project.metrics);

    expect(skippedMetrics).toEqual([{ name: "gmv_growth", reason: "derived metrics are not rendered" }]);
    expect(files.get("rental_orders.view.lkml")).toContain(
      [
        "  measure: completed_rentals__rental_count_measure {",
        "    type: sum",
        "    sql: CASE WHEN ${TABLE}.rental_status = 'completed' THEN 1 ELSE 0 END ;;",
        "    hidden: yes",
        "  }",
        "",
        "  measure: completed_rentals {",
        "    type: number",
        "    sql: ${completed_rentals__rental_count_measure} ;;",
        '    label: "Completed Rentals"',
        "  }",
      ].join("\n")
    );
  });

  it("skips a filtered metric whose filter cannot be evaluated in a measure's view", () => {
    const withStatus: SemanticModel = {
      ...rentals,
      dimensions: [{ name: "status", type: "categorical" }],
    };
    const metric: Metric = {
      ...simpleMetric("users_of_paid", "user_count", "rental"),
      filters: ["{{ Dimension('rental__status') }} = 'paid'"],
    };

    const { validation, skippedMetrics, files } = generateProject([withStatus, users], [metric]);

    expect(validation.issues).toEqual([]);
    expect(skippedMetrics).toEqual([
      { name: "users_of_paid", reason: "filter dimension 'rental__status' is not on model 'users'" },
    ]);
    expect(files.get("users.view.lkml")).not.toContain("users_of_paid");
  });

  it("renders only the first of two metrics sharing a name", () => {
    const { validation, skippedMetrics, files } = generateProject(models, [
      simpleMetric("total_gmv", "gmv", "rental"),
      simpleMetric("total_gmv", "rental_count", "rental"),
    ]);

    expect(validation.errors().map((i) => i.issueType)).toEqual(["duplicate_metric"]);
    expect(skippedMetrics).toEqual([{ name: "total_gmv", reason: "duplicate metric name" }]);

    const view = files.get("rental_orders.view.lkml") ?? "";
    expect(view.split("measure: total_gmv {")).toHaveLength(2);
    expect(view).toContain("    sql: ${gmv_measure} ;;");
  });

  it("throws in strict mode when validation has errors", () => {
    expect(() => generateProject(models, metrics, { strict: true })).toThrow(MetricValidationError);
    expect(() => generateProject(models, metrics, { strict: true })).toThrow(
      "Metric validation failed: 2 errors, 1 warning"
    );
  });

  it("does not throw in strict mode for warnings alone", () => {
    const { skippedMetrics } = generateProject(models, [derivedMetric("growth", "rental")], {
      strict: true,
    });
    expect(skippedMetrics.map((s) => s.name)).toEqual(["growth"]);
  });

  it("defaults the connection name", () => {
    const { files } = generateProject([users], []);
    expect(files.get(MODEL_FILE)).toMatch(/^connection: "database"\n/);
  });

  it("produces nothing for an empty project", () => {
    expect(generateProject([], []).files.size).toBe(0);
  });
});

describe("writeProject", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "lookml-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes each file under the output directory", async () => {
    const out = path.join(dir, "nested");
    const written = await writeProject(new Map([["model.lkml", 'connection: "db"\n']]), out);

    expect(written).toEqual([path.join(out, "model.lkml")]);
    expect(await fs.readFile(path.join(out, "model.lkml"), "utf8")).toBe('connection: "db"\n');
  });
});
