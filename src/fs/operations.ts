/**
 * @fileoverview Filesystem helpers used by the pipeline
 *
 * Thin wrappers over `node:fs/promises` that translate failures into
 * {@link FilesystemError}.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { FilesystemError, getErrnoCode, getErrorMessage } from '../utils/errors.js';

/**
 * Create a directory and its parents. An `EEXIST` race is not an error.
 */
export async function mkdirP(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    if (getErrnoCode(error) === 'EEXIST') return;
    throw new FilesystemError('mkdir', dir, getErrorMessage(error));
  }
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    const code = getErrnoCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') return false;
    throw new FilesystemError('stat', target, getErrorMessage(error));
  }
}

/**
 * Point `linkName` at `target`, replacing whatever file or link is already
 * there. When `linkName` is a directory the link is created inside it under
 * the target's basename, mirroring `ln -sf target dir/`.
 *
 * @returns the path of the link that was created
 */
export async function symlinkForce(target: string, linkName: string): Promise<string> {
  const linkPath = (await isDirectory(linkName))
    ? path.join(linkName, path.basename(target))
    : linkName;

  try {
    await fs.symlink(target, linkPath);
    return linkPath;
  } catch (error) {
    if (getErrnoCode(error) !== 'EEXIST') {
      throw new FilesystemError('symlink', linkPath, getErrorMessage(error));
    }
  }

  try {
    await fs.rm(linkPath, { force: true });
    await fs.symlink(target, linkPath);
  } catch (error) {
    throw new FilesystemError('symlink', linkPath, getErrorMessage(error));
  }
  return linkPath;
}

/**
 * Recursively delete a directory tree. A missing tree is success.
 */
export async function removeTree(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch (error) {
    throw new FilesystemError('remove', dir, getErrorMessage(error));
  }
}

export async function isRegularFile(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch (error) {
    const code = getErrnoCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') return false;
    throw new FilesystemError('stat', file, getErrorMessage(error));
  }
}

/**
 * Create an empty file if it does not exist (`touch` without the mtime bump).
 */
export async function touchFile(file: string): Promise<void> {
  try {
    await fs.writeFile(file, '', { flag: 'a' });
  } catch (error) {
    throw new FilesystemError('write', file, getErrorMessage(error));
  }
}

/**
 * The operations the driver needs, so tests can observe or replace them.
 */
export interface BuildFileSystem {
  mkdirP(dir: string): Promise<void>;
  symlinkForce(target: string, linkName: string): Promise<string>;
  removeTree(dir: string): Promise<void>;
  isRegularFile(file: string): Promise<boolean>;
  isDirectory(target: string): Promise<boolean>;
  touchFile(file: string): Promise<void>;
}

export const nodeFileSystem: BuildFileSystem = {
  mkdirP,
  symlinkForce,
  removeTree,
  isRegularFile,
  isDirectory,
  touchFile,
};
