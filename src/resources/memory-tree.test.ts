import { describe, it, expect } from '@jest/globals';
import { createMemoryResourceTree } from './memory-tree.js';

describe('createMemoryResourceTree', () => {
  const tree = createMemoryResourceTree([
    '/views/home.xhtml',
    '/views/admin/list.xhtml',
    'index.jsp',
    '/empty/',
  ]);

  it('should list the tree root', async () => {
    expect(await tree.listChildren('/')).toEqual(['/empty/', '/index.jsp', '/views/']);
  });

  it('should list nested directories sorted by name', async () => {
    expect(await tree.listChildren('/views/')).toEqual(['/views/admin/', '/views/home.xhtml']);
    expect(await tree.listChildren('/views/admin/')).toEqual(['/views/admin/list.xhtml']);
  });

  it('should accept directory paths without trailing separator', async () => {
    expect(await tree.listChildren('/views')).toEqual(['/views/admin/', '/views/home.xhtml']);
  });

  it('should list declared empty directories', async () => {
    expect(await tree.listChildren('/empty/')).toEqual([]);
  });

  it('should return undefined for unknown directories and files', async () => {
    expect(await tree.listChildren('/missing/')).toBeUndefined();
    expect(await tree.listChildren('/index.jsp')).toBeUndefined();
  });
});
