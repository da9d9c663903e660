/**
 * Tests for verdict classification.
 */
import { describe, it, expect, vi } from 'vitest';
import { classify, findExceptionMarker } from '../../../../src/core/validation/classifier.js';
import { EXCEPTION_MARKERS } from '../../../../src/core/validation/markers.js';

describe('findExceptionMarker', () => {
  it('should find a marker anywhere in the path', () => {
    expect(findExceptionMarker(['Bios', '@Redfish.Settings', 'SettingsObject'])).toBe('@Redfish.Settings');
  });

  it('should return undefined when no marker is present', () => {
    expect(findExceptionMarker(['Systems', 'Members'])).toBeUndefined();
  });

  it('should recognise every built-in marker', () => {
    for (const marker of EXCEPTION_MARKERS) {
      expect(findExceptionMarker(['Actions', marker])).toBe(marker);
    }
  });

  it('should include extra markers', () => {
    expect(findExceptionMarker(['@Acme.Special'], { extraExceptionMarkers: ['@Acme.Special'] })).toBe(
      '@Acme.Special'
    );
  });

  it('should only look at the last segment in strict mode', () => {
    const path = ['@Redfish.Settings', 'SettingsObject'];

    expect(findExceptionMarker(path, { strictMarkers: true })).toBeUndefined();
    expect(findExceptionMarker(['Bios', '@Redfish.Settings'], { strictMarkers: true })).toBe('@Redfish.Settings');
  });

  it('should handle an empty path in strict mode', () => {
    expect(findExceptionMarker([], { strictMarkers: true })).toBeUndefined();
  });
});

describe('classify', () => {
  it('should classify a resource without identifier as an orphan', () => {
    const referencePath = vi.fn(() => []);

    const result = classify({ identifier: undefined, matched: false, referencePath });

    expect(result).toEqual({
      outcome: 'orphan',
      verdict: { result: 'Fail', details: 'Missing "@odata.id" and/or "@odata.type" from the payload' },
    });
    expect(referencePath).not.toHaveBeenCalled();
  });

  it('should pass a matched identifier without building a path', () => {
    const referencePath = vi.fn(() => ['Oem']);

    const result = classify({ identifier: '/redfish/v1/', matched: true, referencePath });

    expect(result).toEqual({ outcome: 'verdict', verdict: { result: 'Pass', details: 'Pass' } });
    expect(referencePath).not.toHaveBeenCalled();
  });

  it('should skip an unmatched identifier under an exception marker', () => {
    const result = classify({
      identifier: '/redfish/v1/Systems/1/Bios/Settings',
      matched: false,
      referencePath: () => ['Systems', 'Members', 'Bios', '@Redfish.Settings', 'SettingsObject'],
    });

    expect(result).toEqual({
      outcome: 'skipped',
      marker: '@Redfish.Settings',
      path: ['Systems', 'Members', 'Bios', '@Redfish.Settings', 'SettingsObject'],
    });
  });

  it('should prefer the exception marker over Oem', () => {
    const result = classify({
      identifier: '/redfish/v1/Oem/Acme/Settings',
      matched: false,
      referencePath: () => ['Oem', 'Acme', '@Redfish.Settings'],
    });

    expect(result.outcome).toBe('skipped');
  });

  it('should warn for an unmatched OEM resource', () => {
    const result = classify({
      identifier: '/redfish/v1/Chassis/1/Oem/Acme',
      matched: false,
      referencePath: () => ['Chassis', 'Members', 'Oem', 'Acme'],
    });

    expect(result).toEqual({
      outcome: 'verdict',
      verdict: {
        result: 'Warning',
        details: "OEM resource '/redfish/v1/Chassis/1/Oem/Acme' was not found in the OpenAPI specification",
      },
    });
  });

  it('should fail an unmatched resource with no marker', () => {
    const result = classify({
      identifier: '/redfish/v1/Widgets/1',
      matched: false,
      referencePath: () => ['Widgets', 'Members'],
    });

    expect(result).toEqual({
      outcome: 'verdict',
      verdict: {
        result: 'Fail',
        details: "Resource '/redfish/v1/Widgets/1' was not found in the OpenAPI specification",
      },
    });
  });

  it('should fail an unmatched resource with an empty path', () => {
    const result = classify({ identifier: '/redfish/v1/Lost', matched: false, referencePath: () => [] });

    expect(result.outcome).toBe('verdict');
    if (result.outcome === 'verdict') {
      expect(result.verdict.result).toBe('Fail');
    }
  });

  it('should not treat a segment merely containing Oem as OEM', () => {
    const result = classify({
      identifier: '/redfish/v1/X',
      matched: false,
      referencePath: () => ['OemData'],
    });

    expect(result.outcome === 'verdict' && result.verdict.result).toBe('Fail');
  });

  it('should apply strict markers', () => {
    const result = classify(
      {
        identifier: '/redfish/v1/Systems/1/Bios/Settings',
        matched: false,
        referencePath: () => ['@Redfish.Settings', 'SettingsObject'],
      },
      { strictMarkers: true }
    );

    expect(result.outcome === 'verdict' && result.verdict.result).toBe('Fail');
  });
});
