/**
 * Reviews Widget
 *
 * Binds the widget markup (see src/site/reviews-widget.ts) to a ReviewsSession.
 * The session, and with it the connectivity probe, starts when the widget
 * mounts on page load; opening the modal only loads the list.
 */

import { ReviewsSession, ReviewsSessionOptions } from './reviews-session';
import { ClientReview, ReviewsApiError } from './types';

export const OFFLINE_MODE_LABEL = 'offline mode (this browser only)';

export interface ReviewsWidgetOptions extends ReviewsSessionOptions {
  /** Asked before a delete; defaults to always yes */
  confirm?: (message: string) => boolean;
}

type ElementType<T extends HTMLElement> = { new (): T; prototype: T };

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : 'Something went wrong';
}

function isUnavailable(err: unknown): boolean {
  return err instanceof ReviewsApiError && err.isUnavailable;
}

export class ReviewsWidget {
  private constructor(
    private readonly doc: Document,
    private readonly session: ReviewsSession,
    private readonly confirm: (message: string) => boolean,
  ) {}

  static async mount(doc: Document, options: ReviewsWidgetOptions): Promise<ReviewsWidget> {
    const session = await ReviewsSession.start(options);
    const widget = new ReviewsWidget(doc, session, options.confirm ?? (() => true));
    widget.bind();
    widget.renderMode();
    widget.renderName();
    widget.renderCaptcha();
    return widget;
  }

  async open(): Promise<void> {
    this.el('rv-modal', HTMLElement).hidden = false;
    this.renderName();
    await this.refresh();
  }

  close(): void {
    this.el('rv-modal', HTMLElement).hidden = true;
  }

  async refresh(): Promise<void> {
    try {
      this.renderReviews(await this.session.loadReviews());
    } catch (err) {
      if (!isUnavailable(err)) {
        this.setStatus(describeError(err));
        return;
      }
      // The session is now local
      this.renderMode();
      this.renderCaptcha();
      this.renderReviews(await this.session.loadReviews());
    }
  }

  async newCaptcha(): Promise<void> {
    try {
      await this.session.refreshCaptcha();
    } catch (err) {
      if (!isUnavailable(err)) this.setStatus(describeError(err));
    }
    this.renderMode();
    this.renderCaptcha();
  }

  async submit(): Promise<void> {
    const publish = this.el('rv-publish', HTMLButtonElement);
    const text = this.el('rv-text', HTMLTextAreaElement);
    publish.disabled = true;
    try {
      await this.session.submit({
        name: this.el('rv-name', HTMLInputElement).value,
        text: text.value,
        captchaAnswer: this.el('rv-captcha-answer', HTMLInputElement).value,
      });
      text.value = '';
      this.setStatus('Published');
      this.renderName();
      this.renderCaptcha();
      await this.refresh();
    } catch (err) {
      if (isUnavailable(err)) {
        this.renderMode();
        this.renderCaptcha();
      }
      this.setStatus(describeError(err));
    } finally {
      publish.disabled = false;
    }
  }

  async remove(id: number): Promise<void> {
    if (!this.confirm('Delete this review?')) return;
    try {
      await this.session.remove(id);
    } catch (err) {
      if (isUnavailable(err)) this.renderMode();
      this.setStatus(describeError(err));
      return;
    }
    this.setStatus('Deleted');
    await this.refresh();
  }

  resetName(): void {
    this.session.resetName();
    this.renderName();
    this.setStatus('Name reset on this browser. The server still remembers this device.');
  }

  private bind(): void {
    this.el('rv-open', HTMLButtonElement).addEventListener('click', () => this.handle(() => this.open()));
    this.el('rv-close', HTMLButtonElement).addEventListener('click', () => this.close());
    this.el('rv-new-captcha', HTMLButtonElement).addEventListener('click', () => this.handle(() => this.newCaptcha()));
    this.el('rv-publish', HTMLButtonElement).addEventListener('click', () => this.handle(() => this.submit()));
    this.el('rv-reset-name', HTMLButtonElement).addEventListener('click', () => this.resetName());
  }

  /** Event handlers can't await; failures end up in the status line */
  private handle(task: () => Promise<void>): void {
    task().catch((err: unknown) => this.setStatus(describeError(err)));
  }

  private el<T extends HTMLElement>(id: string, type: ElementType<T>): T {
    const el = this.doc.getElementById(id);
    if (!(el instanceof type)) throw new Error(`Reviews widget markup is missing #${id}`);
    return el;
  }

  private setStatus(message: string): void {
    this.el('rv-status', HTMLElement).textContent = message;
  }

  private renderMode(): void {
    this.el('rv-mode', HTMLElement).textContent = this.session.mode === 'local' ? OFFLINE_MODE_LABEL : '';
  }

  private renderName(): void {
    const name = this.session.displayName;
    const input = this.el('rv-name', HTMLInputElement);
    const note = this.el('rv-name-note', HTMLElement);
    input.value = name ?? '';
    input.disabled = name !== null;
    note.textContent = name !== null ? `Name saved: ${name}` : 'You can set a name only once on this browser.';
    // The captcha is only asked before the first post
    this.el('rv-captcha-row', HTMLElement).hidden = name !== null;
  }

  private renderCaptcha(): void {
    this.el('rv-captcha-question', HTMLElement).textContent = this.session.currentCaptcha?.question ?? '';
    this.el('rv-captcha-answer', HTMLInputElement).value = '';
  }

  private renderReviews(reviews: ClientReview[]): void {
    const root = this.el('rv-list', HTMLElement);
    root.textContent = '';
    if (reviews.length === 0) {
      const empty = this.doc.createElement('div');
      empty.className = 'rv-note';
      empty.textContent = 'No reviews yet.';
      root.appendChild(empty);
      return;
    }

    for (const review of reviews) {
      const item = this.doc.createElement('div');
      item.className = 'rv-item';
      item.dataset.id = String(review.id);

      const head = this.doc.createElement('div');
      head.className = 'rv-item-head';
      const name = this.doc.createElement('span');
      name.className = 'rv-item-name';
      name.textContent = review.name || 'Anon';
      const when = this.doc.createElement('span');
      when.className = 'rv-note';
      when.textContent = new Date(review.ts * 1000).toLocaleString();
      head.append(name, when);

      const text = this.doc.createElement('div');
      text.className = 'rv-item-text';
      text.textContent = review.text;
      item.append(head, text);

      if (this.session.canDelete(review)) {
        const del = this.doc.createElement('button');
        del.type = 'button';
        del.className = 'rv-btn rv-delete';
        del.textContent = 'Delete';
        del.addEventListener('click', () => this.handle(() => this.remove(review.id)));
        item.appendChild(del);
      }
      root.appendChild(item);
    }
  }
}
