import * as fs from 'fs';
import { Actor } from '../types';
import { RosterError } from './errors';
import { describeErrors, validateRoster } from './schemas';

/**
 * Load the actor roster. The file is a JSON array of personas; an empty
 * roster is rejected since the loop would have nobody to pick.
 */
export async function loadRoster(rosterPath: string): Promise<Actor[]> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.promises.readFile(rosterPath, 'utf-8'));
  } catch (error) {
    throw new RosterError(`Failed to load roster ${rosterPath}: ${String(error)}`, rosterPath);
  }

  if (!validateRoster(data)) {
    throw new RosterError(
      `Invalid roster ${rosterPath}: ${describeErrors(validateRoster.errors)}`,
      rosterPath
    );
  }
  if (data.length === 0) {
    throw new RosterError(`Roster ${rosterPath} has no actors`, rosterPath);
  }

  const seen = new Set<string>();
  for (const actor of data) {
    if (seen.has(actor.id)) {
      throw new RosterError(`Duplicate actor id in ${rosterPath}: ${actor.id}`, rosterPath);
    }
    seen.add(actor.id);
  }

  return data;
}
