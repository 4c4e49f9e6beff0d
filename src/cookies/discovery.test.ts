/**
 * Tests for cookie-file discovery and cookie option resolution
 */

import { jest } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { findCookiesFile, resolveCookieSource } from './discovery';
import { InvalidInputError } from '../utils/errors';
import { resetLogger } from '../utils/logger';

describe('cookies', () => {
  let tempDir: string;

  beforeEach(async () => {
    resetLogger();
    tempDir = await mkdtemp(join(tmpdir(), 'ytgrab-cookies-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('findCookiesFile', () => {
    it('should return null when no candidate exists', async () => {
      await expect(findCookiesFile(tempDir)).resolves.toBeNull();
    });

    it('should find a generic cookies.txt', async () => {
      await writeFile(join(tempDir, 'cookies.txt'), '# Netscape HTTP Cookie File\n');
      await expect(findCookiesFile(tempDir)).resolves.toBe(join(tempDir, 'cookies.txt'));
    });

    it('should prefer the www.youtube.com export over other candidates', async () => {
      await writeFile(join(tempDir, 'cookies.txt'), '');
      await writeFile(join(tempDir, 'youtube.com_cookies.txt'), '');
      await writeFile(join(tempDir, 'www.youtube.com_cookies.txt'), '');

      await expect(findCookiesFile(tempDir)).resolves.toBe(join(tempDir, 'www.youtube.com_cookies.txt'));
    });

    it('should prefer youtube.com_cookies.txt over cookies.txt', async () => {
      await writeFile(join(tempDir, 'cookies.txt'), '');
      await writeFile(join(tempDir, 'youtube.com_cookies.txt'), '');

      await expect(findCookiesFile(tempDir)).resolves.toBe(join(tempDir, 'youtube.com_cookies.txt'));
    });
  });

  describe('resolveCookieSource', () => {
    it('should reject --cookies together with --browser', async () => {
      await expect(resolveCookieSource({ cookies: 'cookies.txt', browser: 'chrome' })).rejects.toBeInstanceOf(
        InvalidInputError
      );
    });

    it('should return none when nothing is given', async () => {
      await expect(resolveCookieSource({})).resolves.toEqual({ kind: 'none' });
    });

    it('should use an existing cookies file', async () => {
      const path = join(tempDir, 'cookies.txt');
      await writeFile(path, '');

      await expect(resolveCookieSource({ cookies: path })).resolves.toEqual({ kind: 'file', path });
    });

    it('should warn and continue without cookies when the file is missing', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const path = join(tempDir, 'missing.txt');

      await expect(resolveCookieSource({ cookies: path })).resolves.toEqual({ kind: 'none' });
      expect(warn).toHaveBeenCalledWith(
        `[ytgrab] WARNING: Cookies file ${path} not found. Proceeding without cookies.`
      );
    });

    it('should pass any browser name through', async () => {
      await expect(resolveCookieSource({ browser: 'vivaldi' })).resolves.toEqual({
        kind: 'browser',
        browser: 'vivaldi',
      });
    });

    it('should fall back to the configured cookies file', async () => {
      const path = join(tempDir, 'cookies.txt');
      await writeFile(path, '');

      await expect(resolveCookieSource({ fallbackCookies: path })).resolves.toEqual({ kind: 'file', path });
    });

    it('should let --browser override the configured cookies file', async () => {
      await expect(
        resolveCookieSource({ browser: 'firefox', fallbackCookies: join(tempDir, 'cookies.txt') })
      ).resolves.toEqual({ kind: 'browser', browser: 'firefox' });
    });
  });
});
