// Entity and measure lookup index over a fixed set of semantic models

import { SemanticContractError } from "@/lib/semantic/errors";
import type { Entity, SemanticModel } from "@/lib/semantic/types";
import { createIssue, IssueType, type ValidationIssue } from "@/lib/validation/types";

export interface SemanticIndex {
  readonly models: readonly SemanticModel[];
  /** Primary entity name -> model declaring it */
  readonly entityToModel: ReadonlyMap<string, SemanticModel>;
  /** Measure name -> model declaring it */
  readonly measureToModel: ReadonlyMap<string, SemanticModel>;
  /** Duplicate declarations found while indexing */
  readonly issues: readonly ValidationIssue[];
}

export function primaryEntityOf(model: SemanticModel): Entity | undefined {
  return model.entities.find((e) => e.type === "primary");
}

function assertWellFormed(models: readonly SemanticModel[]): void {
  const seen = new Set<string>();
  for (const model of models) {
    if (!model.name) {
      throw new SemanticContractError("Semantic model with an empty name.");
    }
    if (seen.has(model.name)) {
      throw new SemanticContractError(
        `Semantic model "${model.name}" is declared more than once.`
      );
    }
    seen.add(model.name);

    for (const e of model.entities) {
      if (!e.name) {
        throw new SemanticContractError(
          `Semantic model "${model.name}" has an entity with an empty name.`
        );
      }
    }
    for (const m of model.measures) {
      if (!m.name) {
        throw new SemanticContractError(
          `Semantic model "${model.name}" has a measure with an empty name.`
        );
      }
    }
  }
}

/**
 * Build the primary-entity and measure indexes. The first declaration of a
 * name wins; later ones are reported as warnings.
 */
export function buildSemanticIndex(models: readonly SemanticModel[]): SemanticIndex {
  assertWellFormed(models);

  const entityToModel = new Map<string, SemanticModel>();
  const measureToModel = new Map<string, SemanticModel>();
  const issues: ValidationIssue[] = [];

  for (const model of models) {
    for (const entity of model.entities) {
      if (entity.type !== "primary") continue;

      const owner = entityToModel.get(entity.name);
      if (!owner) {
        entityToModel.set(entity.name, model);
        continue;
      }
      if (owner === model) continue;
      issues.push(
        createIssue(
          IssueType.DuplicatePrimaryEntity,
          undefined,
          `Primary entity '${entity.name}' is declared by both '${owner.name}' and '${model.name}'. ` +
            `Joins and metrics will use '${owner.name}'.`,
          [
            `Rename the entity in '${model.name}' or make it a foreign entity`,
            "Each primary entity should identify exactly one semantic model",
          ],
          { primaryEntity: entity.name, modelNames: [owner.name, model.name] }
        )
      );
    }

    for (const measure of model.measures) {
      const owner = measureToModel.get(measure.name);
      if (!owner) {
        measureToModel.set(measure.name, model);
        continue;
      }
      if (owner === model) continue;
      issues.push(
        createIssue(
          IssueType.DuplicateMeasure,
          undefined,
          `Measure '${measure.name}' is declared by both '${owner.name}' and '${model.name}'. ` +
            `Metrics will resolve it to '${owner.name}'.`,
          [`Rename the measure in '${model.name}' so metric references are unambiguous`],
          { measureName: measure.name, measureModel: owner.name, modelNames: [owner.name, model.name] }
        )
      );
    }
  }

  return Object.freeze({
    models: Object.freeze([...models]),
    entityToModel,
    measureToModel,
    issues: Object.freeze(issues),
  });
}
