import React from 'react';
import type { Status } from '../types';

export const statusClassName = (status: Status): string =>
  status.kind === 'idle' ? 'status' : `status ${status.kind}`;

export const StatusArea: React.FC<{ status: Status }> = ({ status }) => (
  <div id="status" className={statusClassName(status)} role="status" aria-live="polite">
    {status.message}
  </div>
);
