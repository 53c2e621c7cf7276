import { ObjectTypeName } from '../types';
import { DatabricksClient } from '../utils/databricksClient';
import { CancelledError, ResolutionError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface CreatorLookup {
  getCreator(objectType: ObjectTypeName, objectId: string, signal?: AbortSignal): Promise<string>;
}

interface JobSettings {
  job_id?: number;
  creator_user_name?: string;
}

interface PipelineState {
  pipeline_id?: string;
  creator_user_name?: string;
}

export class CreatorService implements CreatorLookup {
  private client: DatabricksClient;

  constructor(client: DatabricksClient) {
    this.client = client;
  }

  /**
   * Find the user that created a job or pipeline, so ownership can be handed
   * back to them when managed permissions are removed.
   */
  async getCreator(objectType: ObjectTypeName, objectId: string, signal?: AbortSignal): Promise<string> {
    let creator: string | undefined;
    try {
      creator = await this.fetchCreator(objectType, objectId, signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      logger.error(`Cannot load creator of ${objectType} ${objectId}`, error);
      throw new ResolutionError(
        `Cannot load creator of ${objectType} ${objectId}: ${errorMessage(error)}`,
        objectId,
        error,
      );
    }

    if (!creator) {
      throw new ResolutionError(`${objectType} ${objectId} has no creator`, objectId);
    }
    return creator;
  }

  private async fetchCreator(
    objectType: ObjectTypeName,
    objectId: string,
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    switch (objectType) {
      case 'job': {
        const job = await this.client.get<JobSettings>('/jobs/get', {
          query: { job_id: objectId },
          signal,
        });
        return job.creator_user_name;
      }
      case 'pipeline': {
        const pipeline = await this.client.get<PipelineState>(`/pipelines/${objectId}`, { signal });
        return pipeline.creator_user_name;
      }
      default:
        throw new Error(`${objectType} objects do not record a creator`);
    }
  }
}
