import { ScoredAgent, ScoredAgentProfile } from "../../types/ranking.types";

/**
 * Final score snapped to a grid of `tieTolerance`. Comparing snapped keys
 * keeps the ordering transitive; a plain |a - b| <= tolerance test is not.
 */
const tieKey = (finalScore: number, tieTolerance: number): number =>
  tieTolerance > 0 ? Math.round(finalScore / tieTolerance) : finalScore;

/**
 * Orders by final score descending; scores on the same tolerance grid point
 * fall back to agent id ascending. Ranks are positions 1..N.
 */
export const rankAgents = (
  scored: ScoredAgentProfile[],
  tieTolerance: number,
): ScoredAgent[] => {
  const ordered = scored
    .map((agent) => ({ agent, key: tieKey(agent.finalScore, tieTolerance) }))
    .sort((a, b) => b.key - a.key || a.agent.agentId - b.agent.agentId)
    .map(({ agent }) => agent);

  return ordered.map((agent, index) => ({ ...agent, rank: index + 1 }));
};
