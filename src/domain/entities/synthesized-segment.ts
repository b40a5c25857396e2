export type SynthesisFailureKind = "service" | "timeout" | "empty-audio" | "cancelled";

export interface SucceededSegment {
  sequenceIndex: number;
  status: "succeeded";
  audioPath: string;
  attempts: number;
}

export interface FailedSegment {
  sequenceIndex: number;
  status: "failed";
  reason: string;
  failureKind: SynthesisFailureKind;
  attempts: number;
}
