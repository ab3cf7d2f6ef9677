/**
 * Tests for dependency graph helpers
 */

import { describe, it, expect } from 'vitest';
import {
  unknownReferences,
  findCycle,
  dependsOn,
  weakComponents,
  isWeaklyConnected,
  topologicalOrder,
} from './dependency-graph';

describe('dependency graph', () => {
  describe('unknownReferences', () => {
    it('should report dangling ids and keys', () => {
      expect(unknownReferences(['a', 'b'], { b: ['a', 'x'], y: ['a'] })).toEqual(['x', 'y']);
      expect(unknownReferences(['a', 'b'], { b: ['a'] })).toEqual([]);
    });
  });

  describe('findCycle', () => {
    it('should return null for an acyclic graph', () => {
      expect(findCycle(['a', 'b', 'c'], { b: ['a'], c: ['a', 'b'] })).toBeNull();
    });

    it('should return the closed cycle path', () => {
      expect(findCycle(['a', 'b', 'c'], { a: ['c'], b: ['a'], c: ['b'] })).toEqual(['a', 'c', 'b', 'a']);
    });

    it('should detect self-dependencies', () => {
      expect(findCycle(['a'], { a: ['a'] })).toEqual(['a', 'a']);
    });

    it('should ignore edges to unknown nodes', () => {
      expect(findCycle(['a'], { a: ['ghost'], ghost: ['a'] })).toBeNull();
    });
  });

  describe('dependsOn', () => {
    it('should follow transitive edges', () => {
      const deps = { b: ['a'], c: ['b'] };
      expect(dependsOn('c', 'a', deps)).toBe(true);
      expect(dependsOn('a', 'c', deps)).toBe(false);
    });
  });

  describe('weakComponents', () => {
    it('should group nodes regardless of edge direction', () => {
      expect(weakComponents(['a', 'b', 'c', 'd'], { b: ['a'], d: ['c'] })).toEqual([
        ['a', 'b'],
        ['c', 'd'],
      ]);
      expect(isWeaklyConnected(['a', 'b', 'c'], { b: ['a'], c: ['a'] })).toBe(true);
      expect(isWeaklyConnected(['a', 'b'], {})).toBe(false);
      expect(isWeaklyConnected(['a'], {})).toBe(true);
    });
  });

  describe('topologicalOrder', () => {
    it('should keep node order where dependencies allow', () => {
      expect(topologicalOrder(['a', 'b', 'c'], {})).toEqual(['a', 'b', 'c']);
    });

    it('should move dependencies ahead of their dependents', () => {
      expect(topologicalOrder(['c', 'b', 'a'], { c: ['b'], b: ['a'] })).toEqual(['a', 'b', 'c']);
    });

    it('should emit group members together', () => {
      const groups: Record<string, string> = { test: 'g1', security: 'g1' };
      const order = topologicalOrder(
        ['impl', 'debug', 'security', 'test', 'release'],
        { debug: ['test'], security: ['impl'], test: ['impl'], release: ['test'] },
        (id) => groups[id]
      );

      expect(order).toEqual(['impl', 'security', 'test', 'debug', 'release']);
    });

    it('should append nodes caught in a cycle', () => {
      expect(topologicalOrder(['a', 'b', 'c'], { a: ['b'], b: ['a'] })).toEqual(['c', 'a', 'b']);
    });
  });
});
