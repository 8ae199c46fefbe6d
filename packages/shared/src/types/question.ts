export interface QuestionContext {
  question: string;
  user: string;
  /** Timestamp supplied by the caller, passed through verbatim. */
  timestamp: string;
}
