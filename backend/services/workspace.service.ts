import { ObjectStatus } from '../types';
import { DatabricksClient } from '../utils/databricksClient';
import { logger } from '../utils/logger';

export interface PathLookup {
  getStatus(path: string, signal?: AbortSignal): Promise<ObjectStatus>;
}

export class WorkspaceService implements PathLookup {
  private client: DatabricksClient;

  constructor(client: DatabricksClient) {
    this.client = client;
  }

  /**
   * Look up a workspace object (notebook, directory, repo) by its path
   */
  async getStatus(path: string, signal?: AbortSignal): Promise<ObjectStatus> {
    logger.debug(`Looking up workspace path ${path}`);
    return this.client.get<ObjectStatus>('/workspace/get-status', {
      query: { path },
      signal,
    });
  }
}
