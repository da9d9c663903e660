/**
 * Tests for path template matching.
 */
import { describe, it, expect } from 'vitest';
import {
  compileTemplate,
  matches,
  matchesAny,
  PathSet,
} from '../../../../src/core/paths/matcher.js';
import { MalformedTemplateError } from '../../../../src/utils/errors.js';

describe('compileTemplate', () => {
  it('should replace each placeholder with a single-segment wildcard', () => {
    const compiled = compileTemplate('/redfish/v1/Chassis/{ChassisId}/Sensors/{SensorId}');

    expect(compiled.placeholders).toEqual(['ChassisId', 'SensorId']);
    expect(compiled.pattern.test('/redfish/v1/Chassis/1/Sensors/Temp1')).toBe(true);
    expect(compiled.pattern.test('/redfish/v1/Chassis/1/Sensors/Temp1/Extra')).toBe(false);
    expect(compiled.pattern.test('/redfish/v1/Chassis/1/2/Sensors/Temp1')).toBe(false);
  });

  it('should compile a template without placeholders', () => {
    const compiled = compileTemplate('/redfish/v1/');

    expect(compiled.placeholders).toEqual([]);
    expect(compiled.pattern.test('/redfish/v1/')).toBe(true);
  });

  it('should treat regex metacharacters literally', () => {
    const compiled = compileTemplate('/redfish/v1/$metadata');

    expect(compiled.pattern.test('/redfish/v1/$metadata')).toBe(true);
    expect(compiled.pattern.test('/redfish/v1/Xmetadata')).toBe(false);
  });

  it('should reject an unclosed brace', () => {
    expect(() => compileTemplate('/redfish/v1/Chassis/{ChassisId')).toThrow(MalformedTemplateError);
  });

  it('should reject a stray closing brace', () => {
    expect(() => compileTemplate('/redfish/v1/Chassis/ChassisId}')).toThrow(
      "Malformed path template '/redfish/v1/Chassis/ChassisId}': unexpected '}' at position 29"
    );
  });

  it('should reject nested braces', () => {
    expect(() => compileTemplate('/redfish/v1/{a{b}}')).toThrow(MalformedTemplateError);
  });

  it('should keep an empty brace group as literal text', () => {
    const compiled = compileTemplate('/redfish/v1/Chassis/{}');

    expect(compiled.placeholders).toEqual([]);
    expect(compiled.pattern.test('/redfish/v1/Chassis/{}')).toBe(true);
    expect(compiled.pattern.test('/redfish/v1/Chassis/1')).toBe(false);
  });

  it('should keep a non-alphanumeric brace group as literal text', () => {
    const compiled = compileTemplate('/redfish/v1/Chassis/{Chassis_Id}/Sensors/{SensorId}');

    expect(compiled.placeholders).toEqual(['SensorId']);
    expect(compiled.pattern.test('/redfish/v1/Chassis/{Chassis_Id}/Sensors/Temp')).toBe(true);
    expect(compiled.pattern.test('/redfish/v1/Chassis/1/Sensors/Temp')).toBe(false);
  });

  it('should carry the template and error code', () => {
    try {
      compileTemplate('/a/{b');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedTemplateError);
      if (error instanceof MalformedTemplateError) {
        expect(error.template).toBe('/a/{b');
        expect(error.code).toBe('PATH_MALFORMED_TEMPLATE');
      }
    }
  });
});

describe('matches', () => {
  const template = '/redfish/v1/Chassis/{ChassisId}';

  it('should match one concrete segment', () => {
    expect(matches('/redfish/v1/Chassis/1', template)).toBe(true);
  });

  it('should not match a deeper identifier', () => {
    expect(matches('/redfish/v1/Chassis/1/Thermal', template)).toBe(false);
  });

  it('should not match an empty segment', () => {
    expect(matches('/redfish/v1/Chassis/', template)).toBe(false);
  });

  it('should not match a prefix of the template', () => {
    expect(matches('/redfish/v1/Chassis', template)).toBe(false);
  });

  it('should not match with a leading prefix', () => {
    expect(matches('/x/redfish/v1/Chassis/1', template)).toBe(false);
  });

  it('should not add trailing-slash leniency', () => {
    expect(matches('/redfish/v1/Chassis/1/', template)).toBe(false);
    expect(matches('/redfish/v1', '/redfish/v1/')).toBe(false);
  });

  it('should accept a compiled template', () => {
    expect(matches('/redfish/v1/Chassis/A%20B', compileTemplate(template))).toBe(true);
  });
});

describe('PathSet', () => {
  it('should sort and deduplicate templates', () => {
    const set = PathSet.fromTemplates([
      '/redfish/v1/Systems',
      '/redfish/v1/',
      '/redfish/v1/Chassis',
      '/redfish/v1/Systems',
    ]);

    expect(set.size).toBe(3);
    expect(set.templates()).toEqual(['/redfish/v1/', '/redfish/v1/Chassis', '/redfish/v1/Systems']);
  });

  it('should fail at construction on a malformed template', () => {
    expect(() => PathSet.fromTemplates(['/redfish/v1/', '/redfish/v1/{Bad'])).toThrow(MalformedTemplateError);
  });

  it('should find the first matching template in sorted order', () => {
    const set = PathSet.fromTemplates(['/redfish/v1/Systems/{SystemId}', '/redfish/v1/Systems/{Id}']);

    expect(set.find('/redfish/v1/Systems/1')?.template).toBe('/redfish/v1/Systems/{Id}');
    expect(set.find('/redfish/v1/Managers/1')).toBeUndefined();
  });

  it('should be iterable', () => {
    const set = PathSet.fromTemplates(['/b', '/a']);

    expect([...set].map((c) => c.template)).toEqual(['/a', '/b']);
  });

  it('should create an empty set', () => {
    expect(PathSet.empty().size).toBe(0);
  });
});

describe('matchesAny', () => {
  const set = PathSet.fromTemplates([
    '/redfish/v1/',
    '/redfish/v1/Chassis',
    '/redfish/v1/Chassis/{ChassisId}',
  ]);

  it('should match when any template matches', () => {
    expect(matchesAny('/redfish/v1/', set)).toBe(true);
    expect(matchesAny('/redfish/v1/Chassis/Blade1', set)).toBe(true);
  });

  it('should not match when no template matches', () => {
    expect(matchesAny('/redfish/v1/Chassis/Blade1/Power', set)).toBe(false);
  });

  it('should never match against an empty set', () => {
    expect(matchesAny('/redfish/v1/', PathSet.empty())).toBe(false);
  });
});
