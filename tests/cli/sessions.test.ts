/**
 * Unit tests for the sessions listing
 */

import { describe, it, expect } from 'vitest';
import { formatSessionLine } from '../../src/cli/commands/sessions.js';

describe('formatSessionLine()', () => {
  it('should show the step being asked, counted from one', () => {
    const line = formatSessionLine(
      {
        userId: '42',
        currentStep: 1,
        answers: [20],
        createdAt: Date.UTC(2024, 0, 1, 9, 0, 0),
        updatedAt: Date.UTC(2024, 0, 1, 9, 5, 0),
      },
      3
    );

    expect(line).toBe('42\tstep 2/3\tupdated 2024-01-01T09:05:00.000Z');
  });
});
