import { z } from 'zod';
import { RequestFailureError } from '../../errors/categories.js';
import type { HttpTransport } from '../../transport/http-transport.js';

export const systemSchema = z
  .object({
    system: z.string(),
    status: z.string(),
    description: z.string().optional(),
  })
  .passthrough();

export const parameterSchema = z
  .object({
    name: z.string(),
    unit: z.string().optional(),
    value: z.unknown(),
  })
  .passthrough();

export const parametersSchema = z.record(z.array(parameterSchema));

const outEnvelopeSchema = z.object({ out: z.unknown() });

export type SystemStatus = z.infer<typeof systemSchema>;
export type DeploymentParameter = z.infer<typeof parameterSchema>;
/** Parameters grouped by section, e.g. `storage`, `utilities`, `general` */
export type DeploymentParameters = z.infer<typeof parametersSchema>;

export interface StatusService {
  allSystems(signal?: AbortSignal): Promise<SystemStatus[]>;
  system(name: string, signal?: AbortSignal): Promise<SystemStatus>;
  parameters(signal?: AbortSignal): Promise<DeploymentParameters>;
}

/**
 * Calls under `/status`, all answered directly (no task)
 */
export class StatusServiceImpl implements StatusService {
  constructor(private readonly transport: HttpTransport) {}

  async allSystems(signal?: AbortSignal): Promise<SystemStatus[]> {
    return this.getOut('/status/systems', z.array(systemSchema), signal);
  }

  async system(name: string, signal?: AbortSignal): Promise<SystemStatus> {
    return this.getOut(`/status/systems/${encodeURIComponent(name)}`, systemSchema, signal);
  }

  async parameters(signal?: AbortSignal): Promise<DeploymentParameters> {
    return this.getOut('/status/parameters', parametersSchema, signal);
  }

  private async getOut<T extends z.ZodTypeAny>(path: string, schema: T, signal?: AbortSignal): Promise<T['_output']> {
    const response = await this.transport.request({ method: 'GET', path, expectedStatus: 200, signal });
    const envelope = outEnvelopeSchema.safeParse(response.body);
    const parsed = schema.safeParse(envelope.success ? envelope.data.out : undefined);
    if (!parsed.success) {
      throw new RequestFailureError(`Unexpected ${path} response format`, {
        status: response.status,
        responseBody: response.body,
        isRetryable: false,
        details: { issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) },
      });
    }
    return parsed.data;
  }
}
