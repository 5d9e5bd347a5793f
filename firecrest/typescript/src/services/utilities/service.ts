import { z } from 'zod';
import { RequestFailureError } from '../../errors/categories.js';
import type { HttpTransport } from '../../transport/http-transport.js';

export const fileEntrySchema = z
  .object({
    name: z.string(),
    type: z.string(),
    link_target: z.string().nullable().optional(),
    user: z.string().optional(),
    group: z.string().optional(),
    permissions: z.string().optional(),
    last_modified: z.string().optional(),
    size: z.union([z.string(), z.number()]).transform(String).optional(),
  })
  .passthrough();

const listFilesResponseSchema = z.object({ output: z.array(fileEntrySchema) });

export type FileEntry = z.infer<typeof fileEntrySchema>;

export interface ListFilesOptions {
  showHidden?: boolean;
  recursive?: boolean;
  signal?: AbortSignal;
}

export interface UtilitiesService {
  listFiles(machine: string, targetPath: string, options?: ListFilesOptions): Promise<FileEntry[]>;
}

export class UtilitiesServiceImpl implements UtilitiesService {
  constructor(private readonly transport: HttpTransport) {}

  /**
   * Lists a remote directory (`ls`)
   */
  async listFiles(machine: string, targetPath: string, options: ListFilesOptions = {}): Promise<FileEntry[]> {
    const response = await this.transport.request({
      method: 'GET',
      path: '/utilities/ls',
      headers: { 'X-Machine-Name': machine },
      query: {
        targetPath,
        showhidden: options.showHidden ? 'true' : undefined,
        recursive: options.recursive ? 'true' : undefined,
      },
      expectedStatus: 200,
      signal: options.signal,
    });

    const parsed = listFilesResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new RequestFailureError('Unexpected /utilities/ls response format', {
        status: response.status,
        responseBody: response.body,
        isRetryable: false,
      });
    }
    return parsed.data.output;
  }
}
