import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type {
  AnnotationQueue,
  AnnotationQueueCreate,
  Dataset,
  DatasetCreate,
  Example,
  ExampleCreate,
  Experiment,
  ExperimentCreate,
  InstanceConfig,
  Rule,
  RuleCreate,
  RunCreate,
  RunQuery,
  RunQueryResponse,
} from '../types/platform.js';
import { NotFoundError, RemoteRejectionError } from '../errors.js';

export const PAGE_SIZE = 100;

export type InstanceRole = 'source' | 'destination';

interface MissingResource {
  resource: string;
  id: string;
}

export function restBaseUrl(apiUrl: string): string {
  return `${apiUrl.replace(/\/+$/, '')}/api/v1`;
}

export class PlatformService {
  private client: AxiosInstance;
  readonly role: InstanceRole;

  constructor(config: InstanceConfig, role: InstanceRole, adapter?: AxiosAdapter) {
    this.role = role;
    this.client = axios.create({
      baseURL: restBaseUrl(config.apiUrl),
      headers: {
        'X-API-Key': config.apiKey,
        'User-Agent': 'LangSmith Instance Migration Tool',
      },
      adapter,
    });
  }

  async getDataset(datasetId: string): Promise<Dataset> {
    return this.request<Dataset>(
      { method: 'GET', url: `/datasets/${datasetId}` },
      'fetch dataset',
      { resource: 'Dataset', id: datasetId }
    );
  }

  async findDatasetsByName(name: string): Promise<Dataset[]> {
    const datasets = await this.request<Dataset[]>(
      { method: 'GET', url: '/datasets', params: { name } },
      'look up datasets'
    );
    return datasets.filter(dataset => dataset.name === name);
  }

  async createDataset(payload: DatasetCreate): Promise<Dataset> {
    return this.request<Dataset>({ method: 'POST', url: '/datasets', data: payload }, 'create dataset');
  }

  async listExamples(datasetId: string): Promise<Example[]> {
    return this.listAll<Example>('/examples', { dataset: datasetId }, 'fetch examples');
  }

  async createExamples(payload: ExampleCreate[]): Promise<Example[]> {
    return this.request<Example[]>({ method: 'POST', url: '/examples/bulk', data: payload }, 'create examples');
  }

  async listExperiments(datasetId: string): Promise<Experiment[]> {
    return this.listAll<Experiment>('/sessions', { reference_dataset: datasetId }, 'fetch experiments');
  }

  async createExperiment(payload: ExperimentCreate): Promise<Experiment> {
    return this.request<Experiment>({ method: 'POST', url: '/sessions', data: payload }, 'create experiment');
  }

  async queryRuns(query: RunQuery): Promise<RunQueryResponse> {
    return this.request<RunQueryResponse>({ method: 'POST', url: '/runs/query', data: query }, 'query runs');
  }

  async createRuns(runs: RunCreate[]): Promise<void> {
    await this.request<unknown>({ method: 'POST', url: '/runs/batch', data: { post: runs } }, 'create runs');
  }

  async getAnnotationQueue(queueId: string): Promise<AnnotationQueue> {
    return this.request<AnnotationQueue>(
      { method: 'GET', url: `/annotation-queues/${queueId}` },
      'fetch annotation queue',
      { resource: 'Annotation queue', id: queueId }
    );
  }

  async findAnnotationQueuesByName(name: string): Promise<AnnotationQueue[]> {
    const queues = await this.request<AnnotationQueue[]>(
      { method: 'GET', url: '/annotation-queues', params: { name } },
      'look up annotation queues'
    );
    return queues.filter(queue => queue.name === name);
  }

  async createAnnotationQueue(payload: AnnotationQueueCreate): Promise<AnnotationQueue> {
    return this.request<AnnotationQueue>(
      { method: 'POST', url: '/annotation-queues', data: payload },
      'create annotation queue'
    );
  }

  async listRules(projectId: string): Promise<Rule[]> {
    return this.request<Rule[]>(
      { method: 'GET', url: '/runs/rules', params: { session_id: projectId } },
      'fetch rules'
    );
  }

  async createRule(payload: RuleCreate): Promise<Rule> {
    return this.request<Rule>({ method: 'POST', url: '/runs/rules', data: payload }, 'create rule');
  }

  // Offset pagination: keep requesting while the last page came back full.
  // A result set that is an exact multiple of PAGE_SIZE ends with one empty page.
  private async listAll<T>(path: string, params: Record<string, string>, action: string): Promise<T[]> {
    const items: T[] = [];
    let lastPageSize = PAGE_SIZE;
    while (lastPageSize === PAGE_SIZE) {
      const page = await this.request<T[]>(
        { method: 'GET', url: path, params: { ...params, offset: items.length, limit: PAGE_SIZE } },
        action
      );
      lastPageSize = page.length;
      items.push(...page);
    }
    return items;
  }

  private async request<T>(config: AxiosRequestConfig, action: string, missing?: MissingResource): Promise<T> {
    try {
      const response = await this.client.request<T>(config);
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        if (error.response.status === 404 && missing) {
          throw new NotFoundError(missing.resource, missing.id, this.role);
        }
        const data: unknown = error.response.data;
        const detail = typeof data === 'string' ? data : JSON.stringify(data);
        throw new RemoteRejectionError(
          action,
          {
            status: error.response.status,
            method: (config.method ?? 'GET').toUpperCase(),
            path: config.url ?? '',
            detail,
          },
          { cause: error }
        );
      }
      if (axios.isAxiosError(error)) {
        throw new Error(`Failed to ${action} on the ${this.role} instance: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}
