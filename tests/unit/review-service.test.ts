import { ReviewService } from '../../src/reviews/review-service';
import { SqliteReviewStore } from '../../src/reviews/review-store';
import { ForbiddenError, ValidationError } from '../../src/reviews/errors';
import { CaptchaAnswer, CaptchaStore, IssuedCaptcha } from '../../src/captcha/types';
import { openDatabase, ReviewsDatabase } from '../../src/storage/database';

/** Accepts exactly the challenges it was told about, once each */
class FakeCaptchaStore implements CaptchaStore {
  readonly answers = new Map<string, string>();
  verifyCalls = 0;

  issue(): IssuedCaptcha {
    this.answers.set('issued', '5');
    return { challengeId: 'issued', question: '2 + 3 = ?' };
  }

  verify(challengeId: string | null | undefined, answer: CaptchaAnswer): boolean {
    this.verifyCalls++;
    if (!challengeId) return false;
    const expected = this.answers.get(challengeId);
    if (expected === undefined || String(answer ?? '').trim() !== expected) return false;
    this.answers.delete(challengeId);
    return true;
  }

  countPending(): number {
    return this.answers.size;
  }
}

describe('ReviewService', () => {
  let db: ReviewsDatabase;
  let captcha: FakeCaptchaStore;
  let service: ReviewService;

  beforeEach(() => {
    db = openDatabase(':memory:');
    captcha = new FakeCaptchaStore();
    service = new ReviewService(new SqliteReviewStore(db), captcha, {
      limits: { defaultLimit: 200, maxLimit: 500 },
      nameMaxLength: 10,
      textMaxLength: 20,
    });
  });

  afterEach(() => {
    db.close();
  });

  describe('createReview', () => {
    it('should create a first review when the captcha passes', () => {
      captcha.answers.set('x', '7');

      const { review, clientId } = service.createReview({
        name: '  Ana ',
        text: ' Lovely ',
        captchaId: 'x',
        captchaAnswer: '7',
      });

      expect(review.name).toBe('Ana');
      expect(review.text).toBe('Lovely');
      expect(clientId).toMatch(/^[0-9a-f]{32}$/);
      expect(review.clientId).toBe(clientId);
      expect(service.listReviews()).toEqual([
        { id: review.id, name: 'Ana', text: 'Lovely', ts: review.createdAt },
      ]);
    });

    it('should accept an explicitly empty text', () => {
      captcha.answers.set('x', '7');

      const { review } = service.createReview({ name: 'Ana', text: '', captchaId: 'x', captchaAnswer: '7' });
      expect(review.text).toBe('');
    });

    it('should reject a missing or blank name', () => {
      expect(() => service.createReview({ text: 'hi' })).toThrow(new ValidationError('name required'));
      expect(() => service.createReview({ name: '   ', text: 'hi' })).toThrow(new ValidationError('name required'));
    });

    it('should reject a missing text field', () => {
      expect(() => service.createReview({ name: 'Ana' })).toThrow(new ValidationError('text required'));
      expect(() => service.createReview({ name: 'Ana', text: null })).toThrow(new ValidationError('text required'));
    });

    it('should reject overlong name and text', () => {
      expect(() => service.createReview({ name: 'A'.repeat(11), text: 'hi' })).toThrow(
        new ValidationError('name too long'),
      );
      expect(() => service.createReview({ name: 'Ana', text: 'B'.repeat(21) })).toThrow(
        new ValidationError('text too long'),
      );
    });

    it('should fail the first post when the captcha is wrong', () => {
      captcha.answers.set('x', '7');

      expect(() =>
        service.createReview({ name: 'Ana', text: 'hi', captchaId: 'x', captchaAnswer: '8' }),
      ).toThrow(new ValidationError('captcha failed'));
      expect(() => service.createReview({ name: 'Ana', text: 'hi' })).toThrow(
        new ValidationError('captcha failed'),
      );
      expect(service.listReviews()).toEqual([]);
    });

    it('should treat an unknown cookie as a first post that needs the captcha', () => {
      expect(() => service.createReview({ name: 'Ana', text: 'hi' }, 'never-posted')).toThrow(
        new ValidationError('captcha failed'),
      );
    });

    it('should lock the name for a device and skip the captcha afterwards', () => {
      captcha.answers.set('x', '7');
      const first = service.createReview({ name: 'Alice', text: 'one', captchaId: 'x', captchaAnswer: '7' });
      const verifyCallsAfterFirst = captcha.verifyCalls;

      expect(() => service.createReview({ name: 'Bob', text: 'two' }, first.clientId)).toThrow(
        new ForbiddenError('name already set for this device'),
      );

      const second = service.createReview({ name: 'Alice', text: 'two' }, first.clientId);
      expect(second.clientId).toBe(first.clientId);
      expect(captcha.verifyCalls).toBe(verifyCallsAfterFirst);
      expect(service.listReviews().map((r) => r.text)).toEqual(['two', 'one']);
    });

    it('should issue different client ids to different devices', () => {
      captcha.answers.set('x', '7');
      captcha.answers.set('y', '4');
      const a = service.createReview({ name: 'Alice', text: 'a', captchaId: 'x', captchaAnswer: '7' });
      const b = service.createReview({ name: 'Alice', text: 'b', captchaId: 'y', captchaAnswer: 4 });
      expect(a.clientId).not.toBe(b.clientId);
    });
  });

  describe('deleteReview', () => {
    it('should delegate to the store', () => {
      captcha.answers.set('x', '7');
      const { review } = service.createReview({ name: 'Ana', text: 'hi', captchaId: 'x', captchaAnswer: '7' });

      service.deleteReview(review.id, review.deleteToken);
      expect(service.listReviews()).toEqual([]);
    });
  });

  describe('listReviews', () => {
    it('should expose only public fields', () => {
      captcha.answers.set('x', '7');
      service.createReview({ name: 'Ana', text: 'hi', captchaId: 'x', captchaAnswer: '7' });

      const [listed] = service.listReviews('5');
      expect(Object.keys(listed).sort()).toEqual(['id', 'name', 'text', 'ts']);
    });
  });

  describe('issueCaptcha', () => {
    it('should delegate to the captcha store', () => {
      expect(service.issueCaptcha()).toEqual({ challengeId: 'issued', question: '2 + 3 = ?' });
    });
  });
});
