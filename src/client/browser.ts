/**
 * Browser entry, bundled by esbuild into dist/public/reviews-client.js.
 * Mounts the reviews widget on pages that carry its markup.
 */

import { LocalReviewsBackend } from './local-backend';
import { RemoteReviewsBackend } from './remote-backend';
import { ReviewsWidget } from './widget';

function boot(): void {
  if (!document.getElementById('rv-modal')) return;
  const storage = window.localStorage;
  ReviewsWidget.mount(document, {
    remote: new RemoteReviewsBackend(),
    local: new LocalReviewsBackend(storage),
    storage,
    confirm: (message) => window.confirm(message),
  }).catch((err: unknown) => {
    console.error('Reviews widget failed to start', err);
  });
}

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', boot);
} else {
  boot();
}
