// Explore generation: fact models joined along the foreign-key graph

import { DEFAULT_MAX_HOPS, JoinGraph } from "@/lib/joins/graph";
import type { JoinStep } from "@/lib/joins/join-types";
import { primaryEntityOf, type SemanticIndex } from "@/lib/joins/semantic-index";
import type { JoinCardinality, SemanticModel } from "@/lib/semantic/types";
import { block, list, optionalStrings, ref, sql, value, type LookmlBlock } from "./types";
import { DIMENSIONS_ONLY_SET, viewName } from "./views";

/** Explore model name -> joined model name -> extra fields of that join */
export type ExposedFields = ReadonlyMap<string, ReadonlyMap<string, readonly string[]>>;

export interface ExploreOptions {
  viewPrefix?: string;
  explorePrefix?: string;
  maxHops?: number;
  /**
   * Measures a joined view must expose beyond its dimensions, e.g. raw
   * measures that metric measures in the explore's base view read
   */
  exposedFields?: ExposedFields;
}

export interface ExploreJoin {
  view: string;
  sqlOn: string;
  relationship: JoinCardinality;
  hops: number;
  fields: string[];
}

/**
 * Models with at least one measure become explores, as do models whose
 * metric measures read other views.
 */
export function factModels(
  models: readonly SemanticModel[],
  exposedFields?: ExposedFields
): SemanticModel[] {
  return models.filter((m) => m.measures.length > 0 || (exposedFields?.has(m.name) ?? false));
}

/**
 * Entity-level join_cardinality wins; otherwise a join on an entity the
 * parent also declares as primary is one-to-one, and anything else is a
 * foreign key and therefore many-to-one.
 */
export function inferRelationship(parent: SemanticModel, entityName: string): JoinCardinality {
  const foreign = parent.entities.find((e) => e.name === entityName && e.type === "foreign");
  if (foreign?.joinCardinality) return foreign.joinCardinality;

  const parentPrimary = parent.entities.some(
    (e) => e.name === entityName && e.type === "primary"
  );
  return parentPrimary ? "one_to_one" : "many_to_one";
}

export function exploreJoins(
  fact: SemanticModel,
  index: SemanticIndex,
  options: ExploreOptions = {}
): ExploreJoin[] {
  const base = primaryEntityOf(fact);
  // A primary entity shadowed by an earlier duplicate roots another model's graph
  if (!base || index.entityToModel.get(base.name) !== fact) return [];

  const graph = new JoinGraph(base.name, index, options.maxHops ?? DEFAULT_MAX_HOPS);
  const exploreName = `${options.explorePrefix ?? ""}${fact.name}`;

  // Inside an explore the base view is addressed by the explore's name
  const alias = (modelName: string) =>
    modelName === fact.name ? exploreName : viewName(modelName, options.viewPrefix);

  const modelByName = new Map(index.models.map((m) => [m.name, m]));
  const exposed = options.exposedFields?.get(fact.name);
  return graph.steps.map((step: JoinStep) => {
    const parent = modelByName.get(step.from);
    if (!parent) {
      throw new Error(`Join step from unknown model "${step.from}".`);
    }
    const view = viewName(step.to, options.viewPrefix);
    return {
      view,
      sqlOn: `${ref(`${alias(step.from)}.${step.entity}`)} = ${ref(`${alias(step.to)}.${step.entity}`)}`,
      relationship: inferRelationship(parent, step.entity),
      hops: step.hops,
      fields: [
        `${view}.${DIMENSIONS_ONLY_SET}*`,
        ...(exposed?.get(step.to) ?? []).map((field) => `${view}.${field}`),
      ],
    };
  });
}

export function buildExplore(
  fact: SemanticModel,
  index: SemanticIndex,
  options: ExploreOptions = {}
): LookmlBlock {
  const body = [
    value("from", viewName(fact, options.viewPrefix)),
    ...optionalStrings({ description: fact.description }),
    ...exploreJoins(fact, index, options).map((join) =>
      block("join", join.view, [
        sql("sql_on", join.sqlOn),
        value("relationship", join.relationship),
        value("type", "left_outer"),
        list("fields", join.fields),
      ])
    ),
  ];
  return block("explore", `${options.explorePrefix ?? ""}${fact.name}`, body);
}

export function buildExplores(index: SemanticIndex, options: ExploreOptions = {}): LookmlBlock[] {
  return factModels(index.models, options.exposedFields).map((fact) =>
    buildExplore(fact, index, options)
  );
}
