import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { HandleRegistry } from './HandleRegistry';
import { LocatorResolver } from './LocatorResolver';
import { makeTempRoot, removeTempRoot } from './test-helpers';

const ORIGIN = 'https://docs.example.com';

describe('LocatorResolver', () => {
  let root: string;
  let outside: string;
  let registry: HandleRegistry;
  let resolver: LocatorResolver;

  beforeEach(() => {
    root = makeTempRoot();
    outside = makeTempRoot('hwpx-outside-');
    registry = new HandleRegistry();
    resolver = new LocatorResolver(registry, { root, allowedOrigins: [ORIGIN], autoRegisterHandles: true });
  });

  afterEach(() => {
    removeTempRoot(root);
    removeTempRoot(outside);
  });

  it('resolves a relative path and reuses its handle for every locator form', async () => {
    fs.mkdirSync(path.join(root, 'docs'));
    fs.writeFileSync(path.join(root, 'docs', 'a.hwpx'), 'x');
    const realFile = path.join(fs.realpathSync(root), 'docs', 'a.hwpx');

    const first = await resolver.resolve('docs/a.hwpx');
    expect(first.created).toBe(true);
    expect(first.resource).toEqual({
      kind: 'local',
      canonicalKey: pathToFileURL(realFile).href,
      path: realFile,
      displayPath: 'docs/a.hwpx',
    });

    const second = await resolver.resolve({ path: './docs/../docs/a.hwpx' });
    expect(second.created).toBe(false);
    expect(second.handle?.handleId).toBe(first.handle?.handleId);

    const byHandle = await resolver.resolve({ handleId: first.handle?.handleId });
    expect(byHandle.resource).toEqual(first.resource);
    expect(registry.size).toBe(1);
  });

  it('resolves files that do not exist yet', async () => {
    const target = await resolver.resolve('new.hwpx');
    expect(target.resource.kind === 'local' && target.resource.displayPath).toBe('new.hwpx');
  });

  it('keeps paths inside the root', async () => {
    await expect(resolver.resolve('../x.hwpx')).rejects.toMatchObject({
      code: 'PATH_ESCAPES_ROOT',
      message: "Path '../x.hwpx' escapes the workspace root",
    });
    await expect(resolver.resolve(path.join(outside, 'x.hwpx'))).rejects.toMatchObject({ code: 'PATH_ESCAPES_ROOT' });
  });

  it('follows symlinks before checking containment', async () => {
    fs.writeFileSync(path.join(outside, 'secret.hwpx'), 'x');
    fs.symlinkSync(path.join(outside, 'secret.hwpx'), path.join(root, 'link.hwpx'));

    await expect(resolver.resolve('link.hwpx')).rejects.toMatchObject({ code: 'PATH_ESCAPES_ROOT' });
  });

  it('rejects malformed locators', async () => {
    for (const raw of [{}, '   ', { path: 'a.hwpx', handleId: 'h_1' }, { uri: 'x', backend: 'ftp' }, 42, null]) {
      await expect(resolver.resolve(raw)).rejects.toMatchObject({ code: 'INVALID_LOCATOR' });
    }
    await expect(resolver.resolve('notes.txt')).rejects.toMatchObject({
      code: 'INVALID_LOCATOR',
      message: 'Only .hwpx documents are supported: notes.txt',
    });
  });

  it('canonicalizes remote URIs on allowed origins', async () => {
    const target = await resolver.resolve({ uri: `${ORIGIN}/files/a.hwpx#page=2`, backend: 'http' });

    expect(target.resource).toEqual({
      kind: 'remote',
      canonicalKey: `${ORIGIN}/files/a.hwpx`,
      uri: `${ORIGIN}/files/a.hwpx`,
      backend: 'http',
    });
    const again = await resolver.resolve({ uri: `${ORIGIN}/files/a.hwpx` });
    expect(again.handle?.handleId).toBe(target.handle?.handleId);
  });

  it('refuses other origins and schemes', async () => {
    await expect(resolver.resolve({ uri: 'https://elsewhere.example.com/a.hwpx' })).rejects.toMatchObject({
      code: 'PATH_ESCAPES_ROOT',
      message: 'Origin https://elsewhere.example.com is not an allowed remote origin',
    });
    await expect(resolver.resolve({ uri: 'ftp://docs.example.com/a.hwpx' })).rejects.toMatchObject({
      code: 'INVALID_LOCATOR',
      message: "Unsupported URI scheme 'ftp:'",
    });
    await expect(resolver.resolve({ uri: 'not a uri' })).rejects.toMatchObject({ code: 'INVALID_LOCATOR' });
  });

  it('fails HANDLE_NOT_FOUND for unknown handles', async () => {
    await expect(resolver.resolve({ handleId: 'h_missing' })).rejects.toMatchObject({ code: 'HANDLE_NOT_FOUND' });
  });

  it('does not register handles when auto-registration is off', async () => {
    const manual = new LocatorResolver(registry, { root, allowedOrigins: [], autoRegisterHandles: false });

    const target = await manual.resolve('a.hwpx');
    expect(target.handle).toBeUndefined();
    expect(target.created).toBe(false);
    expect(registry.size).toBe(0);
  });
});
