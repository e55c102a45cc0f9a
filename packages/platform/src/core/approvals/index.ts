export { ApprovalAggregator } from "./aggregator.js";
export type {
  AssignOutcome,
  AutoTransition,
  DecisionOutcome,
  DecisionRequest,
  UnassignOutcome,
} from "./aggregator.js";
export { countApprovals, deriveAggregate, summarizeApprovals } from "./aggregate.js";
