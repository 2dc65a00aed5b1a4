/**
 * Template interpolation for user-supplied names
 *
 * Renders `{{ function "arg" }}` actions inside configuration strings.
 * Supported functions:
 * - `timestamp`: Unix time in seconds, fixed for one render context
 * - `uuid`: a fresh random UUID per occurrence
 * - `isotime`: RFC 3339 time of the render context
 * - `user "name"`: a user variable
 * - `build_name`: the name of the build
 */

import { v4 as uuidv4 } from 'uuid';
import { type Result, Success, Failure } from '@/types';

export interface TemplateContext {
  /** Render time; every timestamp in one context resolves to this instant */
  now: Date;
  userVariables?: Record<string, string>;
  buildName?: string;
}

type TemplateFunction = (args: string[], ctx: TemplateContext) => Result<string>;

const noArgs =
  (name: string, fn: (ctx: TemplateContext) => string): TemplateFunction =>
  (args, ctx) =>
    args.length === 0 ? Success(fn(ctx)) : Failure(`${name} takes no arguments`);

const FUNCTIONS: Record<string, TemplateFunction> = {
  timestamp: noArgs('timestamp', (ctx) => String(Math.floor(ctx.now.getTime() / 1000))),
  uuid: noArgs('uuid', () => uuidv4()),
  isotime: noArgs('isotime', (ctx) => ctx.now.toISOString().replace(/\.\d{3}Z$/, 'Z')),
  build_name: noArgs('build_name', (ctx) => ctx.buildName ?? ''),
  user: (args, ctx) => {
    const [name] = args;
    if (args.length !== 1 || name === undefined) {
      return Failure('user takes exactly one argument');
    }
    const value = ctx.userVariables?.[name];
    return value !== undefined ? Success(value) : Failure(`user variable "${name}" is not set`);
  },
};

const ACTION = /\{\{(.*?)\}\}/g;
const TOKEN = /"((?:[^"\\]|\\.)*)"|`([^`]*)`|(\S+)/g;

function tokenize(action: string): string[] {
  const tokens: string[] = [];
  for (const match of action.matchAll(TOKEN)) {
    const [, quoted, raw, bare] = match;
    if (quoted !== undefined) tokens.push(quoted.replace(/\\(.)/g, '$1'));
    else tokens.push(raw ?? bare ?? '');
  }
  return tokens;
}

/**
 * Render every `{{ ... }}` action in a template
 */
export function interpolate(template: string, ctx: TemplateContext): Result<string> {
  let output = '';
  let cursor = 0;

  for (const match of template.matchAll(ACTION)) {
    const [whole, body = ''] = match;
    const index = match.index ?? 0;
    output += template.slice(cursor, index);
    cursor = index + whole.length;

    const [name, ...args] = tokenize(body);
    if (name === undefined) {
      return Failure(`template: empty action in "${template}"`);
    }
    const fn = FUNCTIONS[name];
    if (!fn) {
      return Failure(`template: function "${name}" not defined`);
    }
    const rendered = fn(args, ctx);
    if (!rendered.ok) {
      return Failure(`template: ${rendered.error}`);
    }
    output += rendered.value;
  }

  const rest = template.slice(cursor);
  if (rest.includes('{{')) {
    return Failure(`template: unclosed action in "${template}"`);
  }
  return Success(output + rest);
}
