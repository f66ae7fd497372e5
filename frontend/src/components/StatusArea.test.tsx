import { describe, expect, it } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import { StatusArea, statusClassName } from './StatusArea';

describe('StatusArea', () => {
  it('maps the status kind onto a class', () => {
    expect(statusClassName({ message: 'Getting your location…', kind: 'idle' })).toBe('status');
    expect(statusClassName({ message: 'Logged! 🎧', kind: 'ok' })).toBe('status ok');
    expect(statusClassName({ message: 'Error logging.', kind: 'error' })).toBe('status error');
  });

  it('renders the message in the status element', () => {
    expect(renderToStaticMarkup(<StatusArea status={{ message: 'Server unreachable.', kind: 'error' }} />)).toBe(
      '<div id="status" class="status error" role="status" aria-live="polite">Server unreachable.</div>'
    );
  });
});
