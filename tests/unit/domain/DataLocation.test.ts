import { describe, it, expect } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import {
  expandPath,
  hasUrlScheme,
  resolveGenome,
  resolveLocation,
} from '../../../src/domain/value-objects/DataLocation.js';

describe('DataLocation', () => {
  describe('hasUrlScheme', () => {
    it('should recognise remote URLs', () => {
      expect(hasUrlScheme('https://example.org/reads.bam')).toBe(true);
      expect(hasUrlScheme('s3://bucket/reads.bam')).toBe(true);
      expect(hasUrlScheme('gs://bucket/reads.bam')).toBe(true);
    });

    it('should treat plain and drive-letter paths as local', () => {
      expect(hasUrlScheme('/data/reads.bam')).toBe(false);
      expect(hasUrlScheme('reads.bam')).toBe(false);
      expect(hasUrlScheme('C:\\data\\reads.bam')).toBe(false);
    });
  });

  describe('expandPath', () => {
    it('should resolve relative paths against cwd', () => {
      expect(expandPath('reads.bam', '/data')).toBe('/data/reads.bam');
      expect(expandPath('../ref/genome.fa', '/data/run1')).toBe('/data/ref/genome.fa');
    });

    it('should keep absolute paths', () => {
      expect(expandPath('/data/reads.bam', '/elsewhere')).toBe('/data/reads.bam');
    });

    it('should expand the home directory', () => {
      expect(expandPath('~')).toBe(os.homedir());
      expect(expandPath('~/igv/session.xml')).toBe(path.join(os.homedir(), 'igv/session.xml'));
    });
  });

  describe('resolveLocation', () => {
    it('should pass URLs through unchanged', () => {
      expect(resolveLocation('https://example.org/a.bam?x=1', '/data')).toBe('https://example.org/a.bam?x=1');
    });

    it('should expand local paths', () => {
      expect(resolveLocation('a.bam', '/data')).toBe('/data/a.bam');
    });
  });

  describe('resolveGenome', () => {
    /**
     * Scenario: genome id
     * Given 本機沒有名為 hg19 的檔案
     * When 解析 hg19
     * Then 原樣送出 hg19
     */
    it('should keep a genome id when no such file exists', () => {
      expect(resolveGenome('hg19', () => false, '/data')).toBe('hg19');
    });

    /**
     * Scenario: 本機 genome 檔案
     * Given /data/ref.fa 存在
     * When 以相對路徑 ref.fa 解析
     * Then 送出絕對路徑
     */
    it('should send the absolute path of an existing file', () => {
      const exists = (p: string) => p === '/data/ref.fa';
      expect(resolveGenome('ref.fa', exists, '/data')).toBe('/data/ref.fa');
    });
  });
});
