/** Served by the site routes from the esbuild output of src/client/browser.ts */
export const CLIENT_BUNDLE_URL = '/assets/reviews-client.js';

/**
 * Reviews widget markup: a button and a modal with the form and list. The
 * behaviour lives in src/client (ReviewsWidget), loaded from CLIENT_BUNDLE_URL.
 */
export const REVIEWS_WIDGET_HTML = `
<section class="card" id="reviews-entry">
  <h2>Reviews</h2>
  <p class="intro">Leave a note about this site. Your name is fixed for this browser after your first review.</p>
  <button type="button" id="rv-open" class="rv-btn rv-primary">Open reviews</button>
</section>

<div id="rv-modal" class="rv-modal" hidden>
  <div class="rv-dialog" role="dialog" aria-modal="true" aria-labelledby="rv-title">
    <div class="rv-row">
      <h2 id="rv-title">Reviews</h2>
      <span id="rv-mode" class="rv-mode"></span>
      <button type="button" id="rv-close" class="rv-btn" aria-label="Close">&times;</button>
    </div>

    <input id="rv-name" class="rv-input" maxlength="80" placeholder="Your name" />
    <div id="rv-name-note" class="rv-note"></div>

    <div id="rv-captcha-row" class="rv-row">
      <span id="rv-captcha-question" class="rv-question"></span>
      <input id="rv-captcha-answer" class="rv-input rv-answer" inputmode="numeric" placeholder="Answer" />
      <button type="button" id="rv-new-captcha" class="rv-btn">New</button>
    </div>

    <textarea id="rv-text" class="rv-input" rows="4" maxlength="2000" placeholder="Write your review..."></textarea>

    <div class="rv-row">
      <button type="button" id="rv-publish" class="rv-btn rv-primary">Add your review</button>
      <button type="button" id="rv-reset-name" class="rv-btn">Reset name</button>
    </div>
    <div id="rv-status" class="rv-note" role="status"></div>

    <div id="rv-list" class="rv-list"></div>
  </div>
</div>

<style>
  .rv-modal { position: fixed; inset: 0; background: rgba(0,0,0,0.6); display: flex; align-items: center; justify-content: center; padding: 16px; }
  .rv-modal[hidden] { display: none; }
  .rv-dialog { width: 100%; max-width: 560px; background: var(--surface); border: 1px solid var(--border); border-radius: 12px; padding: 16px; }
  .rv-row { display: flex; gap: 8px; align-items: center; margin-top: 10px; }
  .rv-row h2 { flex: 1; margin: 0; }
  .rv-input { width: 100%; padding: 10px; margin-top: 10px; border-radius: 8px; border: 1px solid var(--border); background: transparent; color: var(--text); }
  .rv-answer { width: 110px; margin-top: 0; }
  .rv-question { flex: 1; color: var(--muted); }
  .rv-btn { padding: 8px 12px; border-radius: 8px; border: 1px solid var(--border); background: transparent; color: var(--text); cursor: pointer; }
  .rv-primary { background: linear-gradient(135deg, var(--accent), var(--accent-2)); color: #041028; font-weight: 700; border: none; }
  .rv-note, .rv-mode { color: var(--muted); font-size: 12px; margin-top: 6px; }
  .rv-list { margin-top: 12px; max-height: 300px; overflow: auto; }
  .rv-item { padding: 10px; border-radius: 8px; border: 1px solid var(--border); margin-bottom: 8px; }
  .rv-item-head { display: flex; justify-content: space-between; gap: 8px; }
  .rv-item-name { font-weight: 700; color: var(--accent-2); }
  .rv-item-text { margin-top: 6px; color: var(--muted); white-space: pre-wrap; }
</style>

<script src="${CLIENT_BUNDLE_URL}" defer></script>
`;
