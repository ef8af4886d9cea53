/**
 * Build context hashing
 *
 * A build context is identified by what the build engine would receive: every
 * regular file under the context directory minus the .dockerignore matches.
 */

import { createHash } from 'node:crypto';
import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { glob } from 'glob';
import { Minimatch } from 'minimatch';
import { InvalidConfigurationError, errorMessage, type DeploymentError } from '../errors';
import { Failure, Success, type Result } from '../domain/types/result';

const ALWAYS_IGNORED = ['.git', '.git/**'];

export interface DockerignoreRule {
  pattern: string;
  negated: boolean;
}

/**
 * Parse .dockerignore lines in file order, keeping `!` exceptions.
 */
export function parseDockerignore(content: string): DockerignoreRule[] {
  const rules: DockerignoreRule[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (line === '' || line.startsWith('#')) continue;
    const negated = line.startsWith('!');
    if (negated) line = line.slice(1).trim();
    const pattern = line.replace(/^\/+/, '').replace(/\/+$/, '');
    if (pattern === '') continue;
    rules.push({ pattern, negated });
  }
  return rules;
}

/**
 * Build a predicate over context-relative posix paths. The last rule that
 * matches a path, or one of its parent directories, decides.
 */
export function createIgnoreMatcher(rules: DockerignoreRule[]): (file: string) => boolean {
  const compiled = rules.map((rule) => ({
    matcher: new Minimatch(rule.pattern, { dot: true }),
    negated: rule.negated,
  }));

  return (file: string): boolean => {
    const segments = file.split('/');
    const prefixes = segments.map((_, index) => segments.slice(0, index + 1).join('/'));
    let ignored = false;
    for (const { matcher, negated } of compiled) {
      if (prefixes.some((prefix) => matcher.match(prefix))) {
        ignored = !negated;
      }
    }
    return ignored;
  };
}

async function readDockerignore(context: string): Promise<DockerignoreRule[]> {
  try {
    return parseDockerignore(await readFile(join(context, '.dockerignore'), 'utf-8'));
  } catch {
    // no .dockerignore
    return [];
  }
}

function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Context-relative paths the build engine receives, sorted. The Dockerfile is
 * always included.
 */
export async function listBuildContext(
  context: string,
  dockerfile?: string,
): Promise<Result<string[], DeploymentError>> {
  try {
    const info = await stat(context);
    if (!info.isDirectory()) {
      return Failure(new InvalidConfigurationError(`Build context ${context} is not a directory`));
    }
  } catch (error) {
    return Failure(
      new InvalidConfigurationError(`Build context ${context} is not readable: ${errorMessage(error)}`),
    );
  }

  const isIgnored = createIgnoreMatcher(await readDockerignore(context));
  const candidates = await glob('**/*', {
    cwd: context,
    dot: true,
    nodir: true,
    posix: true,
    ignore: ALWAYS_IGNORED,
  });
  const files = candidates.filter((file) => !isIgnored(file));
  if (dockerfile && !files.includes(dockerfile)) {
    files.push(dockerfile);
  }
  return Success(files.sort());
}

/**
 * sha256 over `relativePath \0 sha256(content)` lines in path order.
 */
export async function hashBuildContext(
  context: string,
  dockerfile?: string,
): Promise<Result<string, DeploymentError>> {
  const listed = await listBuildContext(context, dockerfile);
  if (!listed.ok) return listed;

  const hash = createHash('sha256');
  for (const file of listed.value) {
    let content: Buffer;
    try {
      content = await readFile(join(context, file));
    } catch (error) {
      return Failure(
        new InvalidConfigurationError(`Cannot read ${file} in build context: ${errorMessage(error)}`),
      );
    }
    hash.update(`${file}\0${sha256(content)}\n`);
  }

  return Success(hash.digest('hex'));
}
