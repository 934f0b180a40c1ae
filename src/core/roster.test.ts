import * as fs from 'fs';
import * as path from 'path';
import { loadRoster } from './roster';
import { RosterError } from './errors';
import { createTempDir, removeTempDir, testActors, writeJson } from '../../tests/helpers/store';

describe('loadRoster', () => {
  let tempDir: string;
  let rosterPath: string;

  beforeEach(() => {
    tempDir = createTempDir();
    rosterPath = path.join(tempDir, 'agents.json');
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should load a valid roster', async () => {
    writeJson(rosterPath, testActors);
    await expect(loadRoster(rosterPath)).resolves.toEqual(testActors);
  });

  it('should reject an empty roster', async () => {
    writeJson(rosterPath, []);
    await expect(loadRoster(rosterPath)).rejects.toThrow(`Roster ${rosterPath} has no actors`);
  });

  it('should reject duplicate ids', async () => {
    writeJson(rosterPath, [testActors[0], { ...testActors[1], id: testActors[0].id }]);
    await expect(loadRoster(rosterPath)).rejects.toThrow(
      `Duplicate actor id in ${rosterPath}: agent-1`
    );
  });

  it('should reject traits outside 0..1', async () => {
    writeJson(rosterPath, [{ ...testActors[0], courage: 1.5 }]);
    await expect(loadRoster(rosterPath)).rejects.toBeInstanceOf(RosterError);
  });

  it('should reject a missing or malformed file', async () => {
    await expect(loadRoster(rosterPath)).rejects.toBeInstanceOf(RosterError);

    fs.writeFileSync(rosterPath, '[{');
    await expect(loadRoster(rosterPath)).rejects.toMatchObject({
      code: 'ROSTER',
      metadata: { path: rosterPath },
    });
  });
});
