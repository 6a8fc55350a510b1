/**
 * Tests for the file-system resource tree and a full scan over it
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { createFsResourceTree, resolveTreePath } from '../../src/resources/fs-tree.js';
import { createViewsContext } from '../../src/views/context.js';
import { initializeViews } from '../../src/views/bootstrap.js';
import { getMappedPath } from '../../src/views/view-index.js';
import { createRecordParameterSource } from '../../src/base/config/loader.js';
import { SCAN_PATHS_PARAM } from '../../src/base/config/types.js';
import { createTestWebRoot, type TestWebRoot } from './test-utils.js';
import { FakeDispatcher } from '../../src/views/test-utils.js';

describe('createFsResourceTree', () => {
  let webRoot: TestWebRoot;

  beforeEach(async () => {
    webRoot = await createTestWebRoot([
      '/index.xhtml',
      '/WEB-INF/faces-views/home.xhtml',
      '/WEB-INF/faces-views/admin/users.xhtml',
      '/META-INF/context.xml',
      '/pages/about.jsp',
      '/empty/',
    ]);
  });

  afterEach(() => webRoot.cleanup());

  it('should list the tree root with directories marked', async () => {
    const tree = createFsResourceTree(webRoot.dir);

    expect(await tree.listChildren('/')).toEqual([
      '/META-INF/',
      '/WEB-INF/',
      '/empty/',
      '/index.xhtml',
      '/pages/',
    ]);
  });

  it('should list nested directories with or without trailing separator', async () => {
    const tree = createFsResourceTree(webRoot.dir);

    expect(await tree.listChildren('/WEB-INF/faces-views/')).toEqual([
      '/WEB-INF/faces-views/admin/',
      '/WEB-INF/faces-views/home.xhtml',
    ]);
    expect(await tree.listChildren('/pages')).toEqual(['/pages/about.jsp']);
    expect(await tree.listChildren('/empty/')).toEqual([]);
  });

  it('should return undefined for missing directories and files', async () => {
    const tree = createFsResourceTree(webRoot.dir);

    expect(await tree.listChildren('/missing/')).toBeUndefined();
    expect(await tree.listChildren('/index.xhtml')).toBeUndefined();
  });

  it('should not resolve paths outside the base directory', async () => {
    const tree = createFsResourceTree(path.join(webRoot.dir, 'pages'));

    expect(resolveTreePath(webRoot.dir, '/../outside/')).toBeNull();
    expect(resolveTreePath(webRoot.dir, '/pages/')).toBe(path.join(path.resolve(webRoot.dir), 'pages'));
    expect(await tree.listChildren('/../')).toBeUndefined();
  });

  it('should follow symbolic links to files and directories', async () => {
    const shared = path.join(webRoot.dir, 'shared');
    await fs.mkdir(shared);
    await fs.writeFile(path.join(shared, 'partial.xhtml'), '<html/>');
    const pages = path.join(webRoot.dir, 'pages');
    await fs.symlink(path.join(shared, 'partial.xhtml'), path.join(pages, 'linked.xhtml'));
    await fs.symlink(shared, path.join(pages, 'linked'));
    const tree = createFsResourceTree(webRoot.dir);

    expect(await tree.listChildren('/pages/')).toEqual([
      '/pages/about.jsp',
      '/pages/linked.xhtml',
      '/pages/linked/',
    ]);
    expect(await tree.listChildren('/pages/linked/')).toEqual(['/pages/linked/partial.xhtml']);
  });

  it('should leave out broken links and links back up the tree', async () => {
    const pages = path.join(webRoot.dir, 'pages');
    await fs.symlink(path.join(webRoot.dir, 'missing.xhtml'), path.join(pages, 'broken.xhtml'));
    await fs.symlink(pages, path.join(pages, 'self'));
    await fs.symlink(webRoot.dir, path.join(pages, 'up'));
    const tree = createFsResourceTree(webRoot.dir);

    expect(await tree.listChildren('/pages/')).toEqual(['/pages/about.jsp']);
  });

  it('should build the view index of a web root', async () => {
    const dispatcher = new FakeDispatcher();
    const context = createViewsContext({
      resources: createFsResourceTree(webRoot.dir),
      initParameters: createRecordParameterSource({ [SCAN_PATHS_PARAM]: '/' }),
      dispatcher,
    });

    const result = await initializeViews(context);

    expect(Object.fromEntries(result.views)).toEqual({
      index: '/index.xhtml',
      'pages/about': '/pages/about.jsp',
      'home.xhtml': '/WEB-INF/faces-views/home.xhtml',
      home: '/WEB-INF/faces-views/home.xhtml',
      'admin/users.xhtml': '/WEB-INF/faces-views/admin/users.xhtml',
      'admin/users': '/WEB-INF/faces-views/admin/users.xhtml',
    });
    expect(dispatcher.added).toEqual(['*.xhtml', '*.jsp']);
    expect(getMappedPath(context, 'admin/users')).toBe('/WEB-INF/faces-views/admin/users.xhtml');
  });
});
