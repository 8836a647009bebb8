/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'node:path';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema } from '../../../src/utils/yaml.js';
import { SystemError } from '../../../src/utils/errors.js';
import { createProject, removeProject } from '../../helpers/project.js';

const Schema = z.object({ name: z.string(), count: z.number().default(1) });

describe('parseYaml', () => {
  it('should parse mappings and lists', () => {
    expect(parseYaml('a: 1\nb: [x, y]\n')).toEqual({ a: 1, b: ['x', 'y'] });
  });

  it('should wrap syntax errors in SystemError', () => {
    expect(() => parseYaml('a: [1, 2', 'store.yaml')).toThrow(SystemError);
    expect(() => parseYaml('a: [1, 2', 'store.yaml')).toThrow(/^Invalid YAML in store\.yaml/);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: demo\n', Schema)).toEqual({ name: 'demo', count: 1 });
  });

  it('should report the failing path', () => {
    try {
      parseYamlWithSchema('name: 3\n', Schema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      expect(error instanceof SystemError && error.code).toBe('S002');
      expect(error instanceof SystemError && error.message).toContain('name:');
      expect(error instanceof SystemError && error.details).toMatchObject({ source: 'input', issues: [{ path: 'name' }] });
    }
  });
});

describe('loadYamlWithSchema', () => {
  let root = '';

  afterEach(async () => {
    await removeProject(root);
  });

  it('should add the file path to validation errors', async () => {
    root = await createProject({ 'bad.yaml': 'count: 2\n' });
    const file = path.join(root, 'bad.yaml');

    await expect(loadYamlWithSchema(file, Schema)).rejects.toMatchObject({
      code: 'S002',
      details: expect.objectContaining({ source: file }),
    });
  });

  it('should report unreadable files as parse errors', async () => {
    root = await createProject();

    await expect(loadYamlWithSchema(path.join(root, 'missing.yaml'), Schema)).rejects.toMatchObject({ code: 'S001' });
  });
});
