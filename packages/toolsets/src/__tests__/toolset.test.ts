/**
 * Toolset, version and property dictionary tests
 */

import { describe, it, expect } from 'vitest';
import { PropertyDictionary } from '../propertyDictionary.js';
import { Toolset } from '../toolset.js';
import { compareVersions, convertToVersion, versionsEqual } from '../version.js';

describe('convertToVersion', () => {
  it('should read a single number as a major version', () => {
    expect(convertToVersion('12')).toEqual([12, 0]);
  });

  it('should accept a leading v', () => {
    expect(convertToVersion('v12.0')).toEqual([12, 0]);
    expect(convertToVersion('V14.0.1')).toEqual([14, 0, 1]);
  });

  it('should reject names that are not versions', () => {
    expect(convertToVersion('Foo')).toBeUndefined();
    expect(convertToVersion('')).toBeUndefined();
    expect(convertToVersion('1.2.3.4.5')).toBeUndefined();
  });
});

describe('compareVersions', () => {
  it('should order component-wise', () => {
    expect(compareVersions([12, 0], [11, 5])).toBeGreaterThan(0);
    expect(compareVersions([12, 0], [12, 0, 1])).toBeLessThan(0);
  });

  it('should only call versions with the same components equal', () => {
    expect(versionsEqual([12, 0], [12, 0])).toBe(true);
    expect(versionsEqual([12, 0], [12, 0, 0])).toBe(false);
  });
});

describe('PropertyDictionary', () => {
  it('should look names up case-insensitively and keep the last spelling', () => {
    const properties = new PropertyDictionary({ Configuration: 'Debug' });
    properties.set('CONFIGURATION', 'Release');

    expect(properties.get('configuration')).toBe('Release');
    expect(properties.names()).toEqual(['CONFIGURATION']);
    expect(properties.size).toBe(1);
    expect(properties.toObject()).toEqual({ CONFIGURATION: 'Release' });
  });
});

describe('Toolset', () => {
  describe('getProperty', () => {
    const toolset = new Toolset({
      toolsVersion: '4.0',
      toolsPath: '/tools/4.0',
      properties: { a: 'a1', b: 'b1', c: 'c1' },
      subToolsets: { '11.0': { b: 'b2', c: '' } },
    });

    it('should prefer the sub-toolset value', () => {
      expect(toolset.getProperty('a', '11.0')).toBe('a1');
      expect(toolset.getProperty('b', '11.0')).toBe('b2');
      expect(toolset.getProperty('B', '11.0')).toBe('b2');
    });

    it('should return an empty sub-toolset value over the base one', () => {
      expect(toolset.getProperty('c', '11.0')).toBe('');
    });

    it('should fall back to the base properties', () => {
      expect(toolset.getProperty('b')).toBe('b1');
      expect(toolset.getProperty('b', '99.0')).toBe('b1');
    });

    it('should return undefined for unknown names', () => {
      expect(toolset.getProperty('none', '11.0')).toBeUndefined();
    });
  });

  describe('defaultSubToolsetVersion', () => {
    it('should pick the highest version', () => {
      const toolset = new Toolset({
        toolsVersion: '4.0',
        toolsPath: '/tools/4.0',
        subToolsets: { 'v13.0': {}, Foo: {}, '11.0': {}, 'v12.0': {} },
      });

      expect(toolset.defaultSubToolsetVersion).toBe('v13.0');
    });

    it('should pick the last unversioned name when no name is a version', () => {
      const toolset = new Toolset({
        toolsVersion: '4.0',
        toolsPath: '/tools/4.0',
        subToolsets: { Foo: {}, Bar: {} },
      });

      expect(toolset.defaultSubToolsetVersion).toBe('Bar');
    });

    it('should be undefined without sub-toolsets', () => {
      expect(new Toolset({ toolsVersion: '4.0', toolsPath: '/tools/4.0' }).defaultSubToolsetVersion).toBeUndefined();
    });
  });

  describe('generateSubToolsetVersion', () => {
    const subToolsets = { '11.0': {}, '12.0': {}, '14.0': {} };

    it('should take the override global property first', () => {
      const toolset = new Toolset({
        toolsVersion: '4.0',
        toolsPath: '/tools/4.0',
        subToolsets,
        globalProperties: { VisualStudioVersion: '12.0' },
      });

      expect(toolset.generateSubToolsetVersion({ visualstudioversion: '99.0' }, 13)).toBe('99.0');
    });

    it('should take the toolset global property before the environment', () => {
      const toolset = new Toolset({
        toolsVersion: '4.0',
        toolsPath: '/tools/4.0',
        subToolsets,
        globalProperties: { VisualStudioVersion: '12.0' },
        environmentProperties: { VisualStudioVersion: '11.0' },
      });

      expect(toolset.generateSubToolsetVersion({}, 15)).toBe('12.0');
    });

    it('should take the environment property before the solution version', () => {
      const toolset = new Toolset({
        toolsVersion: '4.0',
        toolsPath: '/tools/4.0',
        subToolsets,
        environmentProperties: { VisualStudioVersion: '11.0' },
      });

      expect(toolset.generateSubToolsetVersion(undefined, 13)).toBe('11.0');
    });

    it('should derive the version from the solution when that sub-toolset exists', () => {
      const toolset = new Toolset({ toolsVersion: '4.0', toolsPath: '/tools/4.0', subToolsets });

      expect(toolset.generateSubToolsetVersion(undefined, 13)).toBe('12.0');
    });

    it('should fall back to the default sub-toolset', () => {
      const toolset = new Toolset({ toolsVersion: '4.0', toolsPath: '/tools/4.0', subToolsets });

      expect(toolset.generateSubToolsetVersion(undefined, 16)).toBe('14.0');
      expect(toolset.generateSubToolsetVersion()).toBe('14.0');
    });

    it('should be undefined with nothing to go on', () => {
      expect(new Toolset({ toolsVersion: '4.0', toolsPath: '/tools/4.0' }).generateSubToolsetVersion()).toBeUndefined();
    });
  });
});
