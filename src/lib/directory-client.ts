import { z } from 'zod';
import type { ConfigStore } from './config.js';
import { requestJson } from './http.js';
import type { Organization, Space } from './types.js';

/**
 * Organization and space lookups against the platform API
 */
export interface DirectoryClient {
  listOrganizations(limit: number): Promise<Organization[]>;
  findOrganizationByName(name: string): Promise<Organization | undefined>;
  listSpaces(org: Organization, limit: number): Promise<Space[]>;
  findSpaceByName(org: Organization, name: string): Promise<Space | undefined>;
}

const ResourceListSchema = z.object({
  resources: z.array(z.object({ guid: z.string(), name: z.string() })),
});

export class HttpDirectoryClient implements DirectoryClient {
  constructor(private readonly config: ConfigStore) {}

  async listOrganizations(limit: number): Promise<Organization[]> {
    return this.list('/v3/organizations', {
      per_page: String(limit),
      order_by: 'name',
    });
  }

  async findOrganizationByName(
    name: string
  ): Promise<Organization | undefined> {
    const [org] = await this.list('/v3/organizations', { names: name });
    return org;
  }

  async listSpaces(org: Organization, limit: number): Promise<Space[]> {
    return this.list('/v3/spaces', {
      organization_guids: org.guid,
      per_page: String(limit),
      order_by: 'name',
    });
  }

  async findSpaceByName(
    org: Organization,
    name: string
  ): Promise<Space | undefined> {
    const [space] = await this.list('/v3/spaces', {
      organization_guids: org.guid,
      names: name,
    });
    return space;
  }

  private async list(
    path: string,
    query: Record<string, string>
  ): Promise<Array<{ guid: string; name: string }>> {
    const url = `${this.config.get('target')}${path}?${new URLSearchParams(query).toString()}`;
    const page = await requestJson(url, ResourceListSchema, {
      headers: { Authorization: this.config.get('accessToken') },
    });
    return page.resources.map(({ guid, name }) => ({ guid, name }));
  }
}
