export type PipelineStage =
  | "RESOLVE_WINDOW"
  | "FETCH_ALL"
  | "MATCH"
  | "LAYOUT"
  | "APPLY_IGNORE_POLICY"
  | "DONE"
  | "PARTIAL_FAILURE"
  | "FAILED";

export type TransitionInput = {
  stage: PipelineStage;
  roomsQueried?: number;
  roomsFailed?: number;
};

export function nextStage(input: TransitionInput): PipelineStage {
  const failed = input.roomsFailed ?? 0;

  switch (input.stage) {
    case "RESOLVE_WINDOW":
      return "FETCH_ALL";
    case "FETCH_ALL":
      return failed > 0 && failed >= (input.roomsQueried ?? 0) ? "FAILED" : "MATCH";
    case "MATCH":
      return "LAYOUT";
    case "LAYOUT":
      return "APPLY_IGNORE_POLICY";
    case "APPLY_IGNORE_POLICY":
      return failed > 0 ? "PARTIAL_FAILURE" : "DONE";
    default:
      return input.stage;
  }
}

export function isTerminal(stage: PipelineStage): boolean {
  return stage === "DONE" || stage === "PARTIAL_FAILURE" || stage === "FAILED";
}
