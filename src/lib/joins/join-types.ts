// Types for join graph traversal

export interface JoinStep {
  from: string; // model name the join starts from
  to: string; // model name reached by the join
  entity: string; // foreign entity on `from`, primary entity on `to`
  hops: number; // depth of `to` from the base model
}
