/**
 * Role log
 *
 * Append-only record of membership and admin changes. The registry replays it
 * on top of the genesis roles at startup.
 */

import { z } from 'zod';
import { JsonlFile } from '../storage/jsonl-file.js';
import { RoleLogCorruptedError } from './access-control-errors.js';
import { ROLES, type RoleEvent } from './access-control-types.js';

export interface RoleLog {
  append(event: RoleEvent): Promise<void>;
  readAll(): Promise<RoleEvent[]>;
}

const role = z.enum(ROLES);
const principal = z.string().min(1);

export const RoleEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('RoleGranted'), role, principal, sender: principal }),
  z.object({ type: z.literal('RoleRevoked'), role, principal, sender: principal }),
  z.object({
    type: z.literal('RoleAdminChanged'),
    role,
    previousAdminRole: role,
    newAdminRole: role,
    sender: principal,
  }),
  z.object({ type: z.literal('RoleSetupCompleted'), sender: principal }),
]);

/**
 * @throws {RoleLogCorruptedError} If the line is not a valid role event
 */
export function parseRoleEvent(line: string, position: number): RoleEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new RoleLogCorruptedError(`line ${position} is not valid JSON`);
  }

  const result = RoleEventSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join('.') || 'root';
    throw new RoleLogCorruptedError(
      `line ${position} has invalid ${path}: ${issue?.message ?? 'unknown'}`
    );
  }
  return result.data;
}

export class InMemoryRoleLog implements RoleLog {
  private readonly events: RoleEvent[] = [];

  constructor(initial: Iterable<RoleEvent> = []) {
    for (const event of initial) {
      this.events.push(Object.freeze({ ...event }));
    }
  }

  async append(event: RoleEvent): Promise<void> {
    this.events.push(Object.freeze({ ...event }));
  }

  async readAll(): Promise<RoleEvent[]> {
    return [...this.events];
  }

  get size(): number {
    return this.events.length;
  }
}

/**
 * JSON-lines file sink: one role event per line
 */
export class JsonlRoleLog implements RoleLog {
  private readonly file: JsonlFile;

  constructor(path: string) {
    this.file = new JsonlFile(path);
  }

  async append(event: RoleEvent): Promise<void> {
    await this.file.append(JSON.stringify(event));
  }

  async readAll(): Promise<RoleEvent[]> {
    const lines = await this.file.readLines();
    return lines.map((line) => parseRoleEvent(line.text, line.lineNumber));
  }
}
