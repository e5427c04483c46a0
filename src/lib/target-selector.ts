import type { ConfigStore } from './config.js';
import type { DirectoryClient } from './directory-client.js';
import { LoginError, errorMessage, type LoginErrorKind } from './errors.js';
import { entityName, type UI } from './terminal.js';
import type { Organization, Space } from './types.js';

/** Listing page size; menus are only enumerated below this */
export const MAX_CHOICES = 50;

interface Named {
  guid: string;
  name: string;
}

interface SelectionSpec<T extends Named> {
  override?: string;
  list(): Promise<T[]>;
  findByName(name: string): Promise<T | undefined>;
  listPrompt: string;
  itemPrompt: string;
  noun: 'org' | 'space';
  notFoundKind: LoginErrorKind;
}

/**
 * Ask the user to pick one of `names`.
 *
 * Returns '' when the user skips. A non-numeric answer is returned as typed
 * without checking it against `names`; the caller resolves it by name.
 */
export async function promptForName(
  ui: UI,
  names: string[],
  listPrompt: string,
  itemPrompt: string
): Promise<string> {
  for (;;) {
    ui.say(listPrompt);

    if (names.length < MAX_CHOICES) {
      names.forEach((name, i) => ui.say(`${i + 1}. ${name}`));
    } else {
      ui.say('There are too many options to display, please type in the name.');
    }

    const answer = await ui.ask(itemPrompt);
    if (answer === '') {
      return '';
    }

    if (!/^[+-]?\d+$/.test(answer)) {
      return answer;
    }

    const index = parseInt(answer, 10);
    if (index >= 1 && index <= names.length) {
      return names[index - 1];
    }
  }
}

async function selectTarget<T extends Named>(
  ui: UI,
  spec: SelectionSpec<T>
): Promise<T | undefined> {
  let name = spec.override ?? '';

  if (name === '') {
    let candidates: T[];
    try {
      candidates = await spec.list();
    } catch (error) {
      throw new LoginError(
        'RemoteUnavailable',
        `Error finding available ${spec.noun}s\n${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (candidates.length === 0) {
      return undefined;
    }
    if (candidates.length === 1) {
      return candidates[0];
    }

    name = await promptForName(
      ui,
      candidates.map((c) => c.name),
      spec.listPrompt,
      spec.itemPrompt
    );
    if (name === '') {
      ui.say('');
      return undefined;
    }
  }

  let found: T | undefined;
  try {
    found = await spec.findByName(name);
  } catch (error) {
    throw new LoginError(
      'RemoteUnavailable',
      `Error finding ${spec.noun} ${entityName(name)}\n${errorMessage(error)}`,
      { cause: error }
    );
  }

  if (!found) {
    throw new LoginError(
      spec.notFoundKind,
      `Error finding ${spec.noun} ${entityName(name)}\n${spec.noun === 'org' ? 'Organization' : 'Space'} '${name}' not found`,
      { queriedName: name }
    );
  }
  return found;
}

/**
 * Resolve and target an organization. Returns undefined when none was
 * targeted, which is not an error.
 */
export async function selectOrganization(
  config: ConfigStore,
  directory: DirectoryClient,
  ui: UI,
  override?: string
): Promise<Organization | undefined> {
  const org = await selectTarget(ui, {
    override,
    list: () => directory.listOrganizations(MAX_CHOICES),
    findByName: (name) => directory.findOrganizationByName(name),
    listPrompt: 'Select an org (or press enter to skip):',
    itemPrompt: 'Org',
    noun: 'org',
    notFoundKind: 'OrganizationNotFound',
  });

  if (org) {
    config.update({ organizationFields: { guid: org.guid, name: org.name } });
    ui.say(`Targeted org ${entityName(org.name)}\n`);
  }
  return org;
}

/**
 * Resolve and target a space inside `org`
 */
export async function selectSpace(
  config: ConfigStore,
  directory: DirectoryClient,
  ui: UI,
  org: Organization,
  override?: string
): Promise<Space | undefined> {
  const space = await selectTarget(ui, {
    override,
    list: () => directory.listSpaces(org, MAX_CHOICES),
    findByName: (name) => directory.findSpaceByName(org, name),
    listPrompt: 'Select a space (or press enter to skip):',
    itemPrompt: 'Space',
    noun: 'space',
    notFoundKind: 'SpaceNotFound',
  });

  if (space) {
    config.update({ spaceFields: { guid: space.guid, name: space.name } });
    ui.say(`Targeted space ${entityName(space.name)}\n`);
  }
  return space;
}
