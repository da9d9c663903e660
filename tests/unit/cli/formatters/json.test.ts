/**
 * Tests for the JSON formatter.
 */
import { describe, it, expect } from 'vitest';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import { createValidationResult } from '../../../../src/core/validation/run.js';

describe('JsonFormatter', () => {
  const result = createValidationResult();
  result.uris.set('/redfish/v1/', { result: 'Pass', details: 'Pass' });
  result.totalPass = 1;
  result.skipped.push({
    identifier: '/redfish/v1/Systems/1/Bios/Settings',
    marker: '@Redfish.Settings',
    path: ['@Redfish.Settings'],
    stoppedBy: 'root',
  });

  it('should output the report document', () => {
    const parsed = JSON.parse(new JsonFormatter().formatResult(result));

    expect(parsed).toEqual({
      summary: { pass: 1, fail: 0, warn: 0 },
      uris: { '/redfish/v1/': { result: 'Pass', details: 'Pass' } },
      orphans: [],
    });
  });

  it('should include skipped resources when asked', () => {
    const parsed = JSON.parse(new JsonFormatter({ showSkipped: true }).formatResult(result));

    expect(parsed.skipped).toEqual([
      {
        identifier: '/redfish/v1/Systems/1/Bios/Settings',
        marker: '@Redfish.Settings',
        path: ['@Redfish.Settings'],
      },
    ]);
  });
});
