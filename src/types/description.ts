/**
 * Task description produced by the description agent.
 */

/**
 * One requirement of the decomposition.
 */
export interface Requirement {
  id: string;
  text: string;
}

/**
 * Free-text problem statement plus its requirement decomposition.
 */
export interface TaskDescription {
  problem_statement: string;
  requirements: Requirement[];
}

/**
 * Raw shape returned by the capability for a description request.
 */
export interface DescriptionOutput {
  problem_statement: string;
  requirements: Array<{ id: string; text: string }>;
}
