// Join graph reachability using breadth-first search over foreign keys

import { SemanticContractError } from "@/lib/semantic/errors";
import type { SemanticModel } from "@/lib/semantic/types";
import type { JoinStep } from "./join-types";
import { buildSemanticIndex, type SemanticIndex } from "./semantic-index";

// dbt's conventional join-depth ceiling
export const DEFAULT_MAX_HOPS = 2;

/**
 * Models and entities reachable from a base entity within `maxHops` joins.
 *
 * Traversal starts at the model declaring `baseEntity` as primary and follows
 * each foreign entity to the model declaring it as primary. The first time a
 * model is reached is via a shortest path, so recorded hop counts are minimal.
 * An unknown base entity yields an empty graph.
 */
export class JoinGraph {
  readonly baseModel: SemanticModel | undefined;

  private readonly _reachableModels = new Map<string, number>();
  private readonly _reachableEntities = new Map<string, number>();
  private readonly _steps: JoinStep[] = [];

  constructor(
    readonly baseEntity: string,
    index: SemanticIndex,
    readonly maxHops: number = DEFAULT_MAX_HOPS
  ) {
    if (!Number.isInteger(maxHops) || maxHops < 1) {
      throw new SemanticContractError(
        `maxHops must be a positive integer, got ${maxHops}.`
      );
    }
    this.baseModel = index.entityToModel.get(baseEntity);
    this.build(index);
  }

  static fromModels(
    baseEntity: string,
    models: readonly SemanticModel[],
    maxHops: number = DEFAULT_MAX_HOPS
  ): JoinGraph {
    return new JoinGraph(baseEntity, buildSemanticIndex(models), maxHops);
  }

  private build(index: SemanticIndex): void {
    if (!this.baseModel) return;

    this._reachableModels.set(this.baseModel.name, 0);
    this._reachableEntities.set(this.baseEntity, 0);

    const queue: Array<{ model: SemanticModel; depth: number }> = [
      { model: this.baseModel, depth: 0 },
    ];

    for (let head = 0; head < queue.length; head++) {
      const { model, depth } = queue[head];
      if (depth >= this.maxHops) continue;

      for (const entity of model.entities) {
        if (entity.type !== "foreign") continue;

        const target = index.entityToModel.get(entity.name);
        if (!target || this._reachableModels.has(target.name)) continue;

        const hops = depth + 1;
        this._reachableModels.set(target.name, hops);
        this._reachableEntities.set(entity.name, hops);
        this._steps.push({ from: model.name, to: target.name, entity: entity.name, hops });
        queue.push({ model: target, depth: hops });
      }
    }
  }

  get reachableModels(): ReadonlyMap<string, number> {
    return this._reachableModels;
  }

  get reachableEntities(): ReadonlyMap<string, number> {
    return this._reachableEntities;
  }

  /** Join steps in discovery order, one per model reached beyond the base */
  get steps(): readonly JoinStep[] {
    return this._steps;
  }

  isEmpty(): boolean {
    return this._reachableModels.size === 0;
  }

  isModelReachable(modelName: string): boolean {
    return this._reachableModels.has(modelName);
  }

  isEntityReachable(entityName: string): boolean {
    return this._reachableEntities.has(entityName);
  }

  getHopCount(modelName: string): number | undefined {
    return this._reachableModels.get(modelName);
  }

  getEntityHopCount(entityName: string): number | undefined {
    return this._reachableEntities.get(entityName);
  }

  getReachableModels(): Map<string, number> {
    return new Map(this._reachableModels);
  }
}
