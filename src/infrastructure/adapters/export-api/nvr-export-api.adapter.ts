import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import type {
  ExportApiPort,
  ExportStatusSnapshot,
} from '../../../application/ports/output/export-api.port';
import type { ClockPort } from '../../../application/ports/output/clock.port';
import { CLOCK_PORT } from '../../../application/ports/output/injection-tokens';
import { AppConfig } from '../../../config/configuration';
import { ApiError } from '../../../domain/errors/api.error';
import { ExportStatusVO } from '../../../domain/value-objects/export-status.vo';
import { TimeWindowVO } from '../../../domain/value-objects/time-window.vo';
import {
  HttpClientService,
  HttpResponse,
  HttpTransportError,
} from '../../../shared/http/http-client.service';

const submitResponseSchema = z.object({
  success: z.boolean().optional(),
  message: z.string().optional(),
  export_id: z.string().min(1),
});

const exportRecordSchema = z.object({
  id: z.string().optional(),
  camera: z.string().optional(),
  name: z.string().optional(),
  /** Creation time, epoch seconds */
  date: z.number().optional(),
  video_path: z.string().optional(),
  in_progress: z.boolean().optional(),
  status: z.string().optional(),
  error: z.string().optional(),
});

const nvrConfigSchema = z.object({
  cameras: z.record(z.unknown()),
});

type ExportRecord = z.infer<typeof exportRecordSchema>;

/**
 * NVR Export API Adapter
 * Implements ExportApiPort against the NVR's REST API
 */
@Injectable()
export class NvrExportApiAdapter implements ExportApiPort {
  private readonly logger = new Logger(NvrExportApiAdapter.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(
    @Inject(HttpClientService) private readonly httpClient: HttpClientService,
    @Inject(ConfigService) configService: ConfigService<AppConfig, true>,
    @Inject(CLOCK_PORT) private readonly clock: ClockPort,
  ) {
    const exportApiConfig = configService.get('exportApi', { infer: true });

    this.baseUrl = configService.get('apiUrl', { infer: true });
    this.timeoutMs = exportApiConfig.timeoutMs;
    this.maxRetries = exportApiConfig.maxRetries;
  }

  async submitExport(camera: string, window: TimeWindowVO): Promise<string> {
    const url =
      `${this.baseUrl}/api/export/${encodeURIComponent(camera)}` +
      `/start/${window.startEpochSeconds}/end/${window.endEpochSeconds}`;

    this.logger.debug(`Submitting export for ${camera} ${window.label()}`);

    // A retried POST could start the same export twice
    const response = await this.send('POST', url, 0, {
      playback: 'realtime',
      source: 'recordings',
      name: `${camera} ${window.label()}`,
    });

    if (!isSuccess(response.statusCode)) {
      throw new ApiError(
        `Export request for ${camera} rejected with status ${response.statusCode}: ${summarize(response.body)}`,
        'status',
        response.statusCode,
      );
    }

    const parsed = submitResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new ApiError(
        `Export request for ${camera} returned no export id: ${summarize(response.body)}`,
        'malformed',
        response.statusCode,
      );
    }
    if (parsed.data.success === false) {
      throw new ApiError(
        `Export request for ${camera} refused: ${parsed.data.message ?? 'no reason given'}`,
        'status',
        response.statusCode,
      );
    }

    return parsed.data.export_id;
  }

  async getJobStatus(jobId: string): Promise<ExportStatusSnapshot> {
    const url = `${this.baseUrl}/api/exports/${encodeURIComponent(jobId)}`;
    const response = await this.send('GET', url, this.maxRetries);

    if (response.statusCode === 404) {
      return { status: ExportStatusVO.notFound() };
    }
    if (!isSuccess(response.statusCode)) {
      throw new ApiError(
        `Status of export ${jobId} unavailable, status ${response.statusCode}`,
        'status',
        response.statusCode,
      );
    }

    const parsed = exportRecordSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new ApiError(
        `Status of export ${jobId} is malformed: ${summarize(response.body)}`,
        'malformed',
        response.statusCode,
      );
    }

    return this.toSnapshot(jobId, parsed.data);
  }

  async deleteExportRecord(jobId: string): Promise<boolean> {
    const url = `${this.baseUrl}/api/export/${encodeURIComponent(jobId)}`;
    const response = await this.send('DELETE', url, this.maxRetries);

    if (isSuccess(response.statusCode) || response.statusCode === 404) {
      return true;
    }

    this.logger.warn(`Deleting export record ${jobId} refused with status ${response.statusCode}`);
    return false;
  }

  async listCameras(): Promise<string[]> {
    const url = `${this.baseUrl}/api/config`;
    const response = await this.send('GET', url, this.maxRetries);

    if (!isSuccess(response.statusCode)) {
      throw new ApiError(
        `NVR configuration unavailable, status ${response.statusCode}`,
        'status',
        response.statusCode,
      );
    }

    const parsed = nvrConfigSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new ApiError('NVR configuration has no camera list', 'malformed', response.statusCode);
    }

    return Object.keys(parsed.data.cameras);
  }

  private toSnapshot(jobId: string, record: ExportRecord): ExportStatusSnapshot {
    const elapsedSeconds =
      record.date === undefined
        ? undefined
        : Math.max(0, this.clock.now().getTime() / 1000 - record.date);
    const base = { name: record.name, elapsedSeconds, videoPath: record.video_path };

    if (record.status?.toLowerCase() === 'failed') {
      return {
        ...base,
        status: ExportStatusVO.failed(),
        errorMessage: record.error ?? 'Export failed on the NVR',
      };
    }

    if (record.in_progress !== false) {
      return { ...base, status: ExportStatusVO.inProgress() };
    }

    if (!record.video_path) {
      throw new ApiError(`Export ${jobId} finished without a video path`, 'malformed');
    }

    return { ...base, status: ExportStatusVO.complete() };
  }

  private async send(
    method: 'GET' | 'POST' | 'DELETE',
    url: string,
    maxRetries: number,
    body?: unknown,
  ): Promise<HttpResponse> {
    const options = { timeoutMs: this.timeoutMs, maxRetries };

    try {
      if (method === 'POST') {
        return await this.httpClient.post(url, body, options);
      }
      if (method === 'DELETE') {
        return await this.httpClient.delete(url, options);
      }
      return await this.httpClient.get(url, options);
    } catch (error) {
      if (error instanceof HttpTransportError) {
        throw new ApiError(error.message, 'transport', undefined, { cause: error });
      }
      throw error;
    }
  }
}

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function summarize(body: unknown): string {
  const text = typeof body === 'string' ? body : JSON.stringify(body) ?? '';
  return text.length > 200 ? `${text.slice(0, 200)}…` : text;
}
