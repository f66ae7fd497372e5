// @vitest-environment jsdom
import { act } from 'react';
import { createRoot, type Root } from 'react-dom/client';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { apiService } from '../services/api';
import { websocketService } from '../services/websocket';
import type { LogEntry } from '../types';
import { LogsPage } from './LogsPage';

const entry = (id: number, locationName: string): LogEntry => ({
  id,
  timestamp: `2026-01-10T1${id}:00:00.000Z`,
  displayTime: `10 Jan 2026, 1${id}:00:00`,
  latitude: 10 + id,
  longitude: 20 + id,
  locationName,
});

describe('LogsPage', () => {
  let container: HTMLDivElement;
  let root: Root;
  let pushEntry: (entry: LogEntry) => void;
  const unsubscribe = vi.fn();

  const places = () => Array.from(container.querySelectorAll('td.place')).map(td => td.textContent);

  const render = async (onNavigate = vi.fn()) => {
    await act(async () => {
      root.render(<LogsPage onNavigate={onNavigate} />);
    });
    return onNavigate;
  };

  beforeEach(() => {
    container = document.createElement('div');
    document.body.appendChild(container);
    root = createRoot(container);
    pushEntry = () => {};
    unsubscribe.mockClear();
    vi.spyOn(websocketService, 'onLogEntry').mockImplementation(handler => {
      pushEntry = handler;
      return unsubscribe;
    });
  });

  afterEach(() => {
    act(() => root.unmount());
    container.remove();
  });

  it('lists the stored entries newest first', async () => {
    vi.spyOn(apiService, 'getLogs').mockResolvedValue([entry(2, 'Oslo, Norway'), entry(1, 'Bergen, Norway')]);

    await render();

    expect(places()).toEqual(['Oslo, Norway', 'Bergen, Norway']);
    expect(container.querySelector('.count')?.textContent).toBe('2 entries');
  });

  it('shows an empty log', async () => {
    vi.spyOn(apiService, 'getLogs').mockResolvedValue([]);

    await render();

    expect(container.querySelector('.empty')?.textContent).toBe('No log entries yet');
  });

  it('prepends entries that arrive live', async () => {
    vi.spyOn(apiService, 'getLogs').mockResolvedValue([entry(1, 'Bergen, Norway')]);
    await render();

    await act(async () => {
      pushEntry(entry(3, 'Tromsø, Norway'));
    });

    expect(places()).toEqual(['Tromsø, Norway', 'Bergen, Norway']);
    expect(container.querySelector('.count')?.textContent).toBe('2 entries');
  });

  it('ignores a live entry it already has', async () => {
    vi.spyOn(apiService, 'getLogs').mockResolvedValue([entry(1, 'Bergen, Norway')]);
    await render();

    await act(async () => {
      pushEntry(entry(1, 'Bergen, Norway'));
    });

    expect(places()).toEqual(['Bergen, Norway']);
  });

  it('reports a failed load', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(apiService, 'getLogs').mockRejectedValue(new Error('Request failed with status code 500'));

    await render();

    expect(container.querySelector('.error-message')?.textContent).toBe('Failed to load log entries');
    expect(container.querySelector('.logs-table')).toBeNull();
  });

  it('stops listening when it unmounts', async () => {
    vi.spyOn(apiService, 'getLogs').mockResolvedValue([]);
    await render();

    act(() => root.unmount());
    root = createRoot(container);

    expect(unsubscribe).toHaveBeenCalledTimes(1);
  });

  it('navigates back to the logger', async () => {
    vi.spyOn(apiService, 'getLogs').mockResolvedValue([]);
    const onNavigate = await render();

    await act(async () => {
      container.querySelector<HTMLButtonElement>('#backButton')?.click();
    });

    expect(onNavigate).toHaveBeenCalledWith('/');
  });
});
