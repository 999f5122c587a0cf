/**
 * Math Captcha Store
 *
 * Issues "a + b = ?" challenges and verifies answers against the `captchas` table.
 * A challenge is deleted when answered correctly or when a verification attempt
 * finds it expired. A wrong answer leaves it in place for a retry.
 */

import { randomBytes, randomInt } from 'crypto';
import { CaptchaAnswer, CaptchaChallenge, CaptchaStore, IssuedCaptcha } from './types';
import { ReviewsDatabase, withStorage } from '../storage/database';
import { Clock, systemClock } from '../storage/clock';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'captcha-store' });

export const DEFAULT_CAPTCHA_TTL_SECONDS = 300;

interface CaptchaRow {
  cid: string;
  answer: string;
  expires_at: number;
}

export interface CaptchaStoreOptions {
  ttlSeconds?: number;
  clock?: Clock;
}

/** Two small operands: a in [2, 9], b in [1, 8] */
export function generateChallenge(): { question: string; answer: string } {
  const a = randomInt(8) + 2;
  const b = randomInt(8) + 1;
  return { question: `${a} + ${b} = ?`, answer: String(a + b) };
}

export class SqliteCaptchaStore implements CaptchaStore {
  private readonly ttlSeconds: number;
  private readonly clock: Clock;

  constructor(
    private readonly db: ReviewsDatabase,
    options: CaptchaStoreOptions = {},
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CAPTCHA_TTL_SECONDS;
    this.clock = options.clock ?? systemClock;
  }

  issue(): IssuedCaptcha {
    const { question, answer } = generateChallenge();
    const challenge: CaptchaChallenge = {
      id: randomBytes(12).toString('hex'),
      expectedAnswer: answer,
      expiresAt: this.clock() + this.ttlSeconds,
    };

    withStorage('captcha.issue', () => {
      this.db
        .prepare<[string, string, number]>(
          'INSERT OR REPLACE INTO captchas(cid, answer, expires_at) VALUES (?, ?, ?)',
        )
        .run(challenge.id, challenge.expectedAnswer, challenge.expiresAt);
    });

    // TODO: reap expired challenges; nothing deletes a challenge that is never retried
    return { challengeId: challenge.id, question };
  }

  verify(challengeId: string | null | undefined, answer: CaptchaAnswer): boolean {
    if (!challengeId) return false;

    return withStorage('captcha.verify', () => {
      const row = this.db
        .prepare<[string], CaptchaRow>('SELECT cid, answer, expires_at FROM captchas WHERE cid = ?')
        .get(challengeId);
      if (!row) return false;

      if (this.clock() > row.expires_at) {
        this.remove(row.cid);
        log.debug({ challengeId }, 'Captcha expired');
        return false;
      }

      if (String(answer ?? '').trim() !== row.answer.trim()) {
        return false;
      }

      this.remove(row.cid);
      return true;
    });
  }

  countPending(): number {
    return withStorage('captcha.count', () => {
      const row = this.db
        .prepare<[], { pending: number }>('SELECT COUNT(*) AS pending FROM captchas')
        .get();
      return row?.pending ?? 0;
    });
  }

  private remove(challengeId: string): void {
    this.db.prepare<[string]>('DELETE FROM captchas WHERE cid = ?').run(challengeId);
  }
}
