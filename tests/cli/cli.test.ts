/**
 * Tests for the view-index command
 */

import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { parseArgs, run } from '../../src/cli/index.js';
import { createTestWebRoot, type TestWebRoot } from '../integration/test-utils.js';

describe('view-index CLI', () => {
  describe('parseArgs', () => {
    it('should default to the working directory', () => {
      expect(parseArgs([])).toEqual({ dir: process.cwd(), json: false, help: false });
    });

    it('should read the directory and flags', () => {
      expect(parseArgs(['site', '--json', '--scan-paths', '/,/t/*.jsp'])).toEqual({
        dir: path.resolve('site'),
        scanPaths: '/,/t/*.jsp',
        json: true,
        help: false,
      });
      expect(parseArgs(['--scan-paths=/x/']).scanPaths).toBe('/x/');
      expect(parseArgs(['-h']).help).toBe(true);
    });

    it('should reject unknown options', () => {
      expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    });
  });

  describe('run', () => {
    let webRoot: TestWebRoot;
    let output: string[];
    let errors: string[];

    beforeEach(async () => {
      webRoot = await createTestWebRoot([
        '/index.xhtml',
        '/META-INF/hidden.xhtml',
        '/WEB-INF/faces-views/home.xhtml',
      ]);
      output = [];
      errors = [];
      jest.spyOn(console, 'log').mockImplementation((message?: unknown) => {
        output.push(String(message));
      });
      jest.spyOn(console, 'error').mockImplementation((message?: unknown) => {
        errors.push(String(message));
      });
    });

    afterEach(async () => {
      jest.restoreAllMocks();
      await webRoot.cleanup();
    });

    it('should print the index as JSON', async () => {
      const code = await run([webRoot.dir, '--json', '--scan-paths', '/']);

      expect(code).toBe(0);
      expect(JSON.parse(output[output.length - 1])).toEqual({
        views: {
          home: '/WEB-INF/faces-views/home.xhtml',
          'home.xhtml': '/WEB-INF/faces-views/home.xhtml',
          index: '/index.xhtml',
        },
        extensions: ['*.xhtml'],
      });
    });

    it('should only report a finished scan when scanning ran', async () => {
      const chunks: string[] = [];
      jest.spyOn(process.stderr, 'write').mockImplementation((chunk: unknown) => {
        chunks.push(String(chunk));
        return true;
      });
      const saved = process.env.VIEW_INDEX_SCAN_ENABLED;
      process.env.VIEW_INDEX_SCAN_ENABLED = 'false';

      try {
        const code = await run([webRoot.dir]);

        expect(code).toBe(0);
        expect(chunks.some((chunk) => chunk.includes('Scanned'))).toBe(false);
        expect(output[output.length - 1]).toContain('Scanning is disabled');
      } finally {
        if (saved === undefined) {
          delete process.env.VIEW_INDEX_SCAN_ENABLED;
        } else {
          process.env.VIEW_INDEX_SCAN_ENABLED = saved;
        }
      }

      await run([webRoot.dir]);

      expect(chunks.some((chunk) => chunk.includes(`Scanned ${webRoot.dir}`))).toBe(true);
    });

    it('should fail on a malformed root path', async () => {
      const code = await run([webRoot.dir, '--json', '--scan-paths', '/a/*.x*.y']);

      expect(code).toBe(1);
      expect(errors[errors.length - 1]).toContain(
        'Root path "/a/*.x*.y" contains more than one "*" (view-index.scan-paths)'
      );
    });

    it('should print usage for unknown options', async () => {
      const code = await run(['--nope']);

      expect(code).toBe(1);
      expect(errors[0]).toContain('Unknown option: --nope');
      expect(output[0]).toContain('Usage: view-index');
    });
  });
});
