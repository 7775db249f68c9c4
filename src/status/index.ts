export {
  CampaignStatusMachine,
  decideNextStatus,
  buildStatusInput,
  shouldBeActive,
} from "./campaign-status-machine";
export type { StatusInput, StatusEvaluation } from "./campaign-status-machine";
