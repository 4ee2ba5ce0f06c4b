/**
 * Metadata sync Unit Tests
 */

import { expect } from 'chai';
import * as fs from 'fs';
import * as path from 'path';
import { memoryRegistry, silenceLogs, tempDir } from '../../__tests__/fakes';
import { ConfigError } from '../../utils/errors';
import { loadMetadataFile, proxyEntries, syncFromFiles } from '../metadata-sync';

describe('metadata sync', () => {
  silenceLogs();

  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should key proxy lines by position and skip invalid ones', () => {
    expect(proxyEntries(['10.0.0.1:8080', 'garbage', 'u:p@10.0.0.3:8080'])).to.deep.equal([
      { id: 1, proxy: 'http://10.0.0.1:8080' },
      { id: 3, proxy: 'http://u:p@10.0.0.3:8080' },
    ]);
  });

  it('should apply proxy.txt, then metadata.json', () => {
    const registry = memoryRegistry(3);
    const [w1, , w3] = registry.list();
    const proxiesFile = path.join(dir, 'proxy.txt');
    const metadataFile = path.join(dir, 'metadata.json');
    fs.writeFileSync(proxiesFile, 'http://u:p@10.0.0.1:8080\ngarbage\n10.0.0.3:3128\n');
    fs.writeFileSync(
      metadataFile,
      JSON.stringify([
        { address: w3.address, proxy: 'socks5://u:p@10.0.0.30:1080', discord: 'test-discord' },
        { address: w1.address, proxy: 'bad proxy' },
      ])
    );

    const report = syncFromFiles(registry, { metadataFile, proxiesFile });

    expect(report).to.deep.equal({ updated: 3, unchanged: 1, unknown: [] });
    expect(registry.get(1).proxy).to.equal('http://u:p@10.0.0.1:8080');
    expect(registry.get(2).proxy).to.be.null;
    expect(registry.get(3).proxy).to.equal('socks5://u:p@10.0.0.30:1080');
    expect(registry.get(3).socials).to.deep.equal({ discord: 'test-discord' });
  });

  it('should read a missing metadata file as empty', () => {
    expect(loadMetadataFile(path.join(dir, 'metadata.json'))).to.deep.equal([]);
  });

  it('should reject a metadata file of the wrong shape', () => {
    const file = path.join(dir, 'metadata.json');
    fs.writeFileSync(file, JSON.stringify({ address: 'not-an-array' }));
    expect(() => loadMetadataFile(file)).to.throw(ConfigError, 'Invalid metadata file');
  });
});
