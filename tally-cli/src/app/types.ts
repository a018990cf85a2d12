export type TranscriptKind = "input" | "result" | "info" | "error";

export type TranscriptEntry = {
  id: string;
  kind: TranscriptKind;
  content: string;
};

export type DisplayLine = {
  readonly text: string;
  readonly color?: "green" | "cyan" | "red";
  readonly bold?: boolean;
};
