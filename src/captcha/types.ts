export interface CaptchaChallenge {
  id: string;
  expectedAnswer: string;
  /** Unix seconds */
  expiresAt: number;
}

export interface IssuedCaptcha {
  challengeId: string;
  question: string;
}

/** Answers arrive from JSON bodies, so numbers are accepted alongside strings */
export type CaptchaAnswer = string | number | null | undefined;

export interface CaptchaStore {
  issue(): IssuedCaptcha;
  /** True only for a known, unexpired challenge answered correctly; consumes it */
  verify(challengeId: string | null | undefined, answer: CaptchaAnswer): boolean;
  /** Challenges currently stored, expired or not */
  countPending(): number;
}
