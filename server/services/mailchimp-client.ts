import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { CampaignPlatformError } from '../errors';
import { log } from '../log';
import type { SubscriberMember } from './subscriber-matcher';

/**
 * Campaign platform boundary. Every operation can fail on its own and
 * surfaces as CampaignPlatformError.
 */
export interface CampaignPlatform {
  fetchMembers(): Promise<SubscriberMember[]>;
  createSegment(name: string, emails: string[]): Promise<string>;
  createCampaign(input: CampaignInput): Promise<string>;
  getCampaignHtml(campaignId: string): Promise<string>;
  setCampaignHtml(campaignId: string, html: string): Promise<void>;
  sendCampaign(campaignId: string): Promise<void>;
  deleteSegment(segmentId: string): Promise<void>;
}

export interface CampaignInput {
  segmentId: string;
  subject: string;
  title: string;
  fromName: string;
  replyTo: string;
}

export interface MailchimpOptions {
  apiKey: string;
  listId: string;
  templateId?: number;
  pageSize?: number;
  http?: AxiosInstance;
}

const membersPageSchema = z.object({
  members: z.array(z.object({
    email_address: z.string().optional(),
    merge_fields: z.record(z.unknown()).optional(),
  }).passthrough()),
  total_items: z.number().optional(),
});

const idSchema = z.object({ id: z.union([z.string(), z.number()]).transform(String) }).passthrough();
const contentSchema = z.object({ html: z.string().optional() }).passthrough();

/** "abc123-us21" -> "us21" */
export function dataCenterOf(apiKey: string): string {
  const cut = apiKey.lastIndexOf('-');
  return cut === -1 ? 'us1' : apiKey.slice(cut + 1);
}

function platformError(operation: string, error: unknown): CampaignPlatformError {
  if (error instanceof CampaignPlatformError) return error;
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    const detail = typeof data === 'object' && data !== null && 'detail' in data && typeof data.detail === 'string'
      ? data.detail
      : error.message;
    return new CampaignPlatformError(operation, error.response?.status ?? null, detail, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CampaignPlatformError(operation, null, message, { cause: error });
}

/**
 * Mailchimp Marketing API v3 over axios.
 */
export class MailchimpClient implements CampaignPlatform {
  private http: AxiosInstance;
  private pageSize: number;

  constructor(private readonly options: MailchimpOptions) {
    this.pageSize = options.pageSize ?? 1000;
    this.http = options.http ?? axios.create({
      baseURL: `https://${dataCenterOf(options.apiKey)}.api.mailchimp.com/3.0`,
      timeout: 30000,
      auth: { username: 'anystring', password: options.apiKey },
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw platformError(operation, error);
    }
  }

  async fetchMembers(): Promise<SubscriberMember[]> {
    return this.call('fetchMembers', async () => {
      const members: SubscriberMember[] = [];
      for (let offset = 0; ; offset += this.pageSize) {
        const response = await this.http.get<unknown>(`/lists/${this.options.listId}/members`, {
          params: { count: this.pageSize, offset },
        });
        const page = membersPageSchema.parse(response.data);
        for (const member of page.members) {
          members.push({ email: member.email_address ?? '', mergeFields: member.merge_fields ?? {} });
        }
        const total = page.total_items ?? members.length;
        if (page.members.length < this.pageSize || members.length >= total) break;
      }
      log(`Fetched ${members.length} list members`, 'MAILCHIMP');
      return members;
    });
  }

  async createSegment(name: string, emails: string[]): Promise<string> {
    return this.call('createSegment', async () => {
      const response = await this.http.post<unknown>(`/lists/${this.options.listId}/segments`, {
        name,
        static_segment: emails,
      });
      return idSchema.parse(response.data).id;
    });
  }

  async createCampaign(input: CampaignInput): Promise<string> {
    return this.call('createCampaign', async () => {
      const response = await this.http.post<unknown>('/campaigns', {
        type: 'regular',
        recipients: {
          list_id: this.options.listId,
          segment_opts: { saved_segment_id: Number(input.segmentId) },
        },
        settings: {
          subject_line: input.subject,
          title: input.title,
          from_name: input.fromName,
          reply_to: input.replyTo,
          ...(this.options.templateId !== undefined ? { template_id: this.options.templateId } : {}),
        },
      });
      return idSchema.parse(response.data).id;
    });
  }

  async getCampaignHtml(campaignId: string): Promise<string> {
    return this.call('getCampaignHtml', async () => {
      const response = await this.http.get<unknown>(`/campaigns/${campaignId}/content`);
      return contentSchema.parse(response.data).html ?? '';
    });
  }

  async setCampaignHtml(campaignId: string, html: string): Promise<void> {
    await this.call('setCampaignHtml', () => this.http.put(`/campaigns/${campaignId}/content`, { html }));
  }

  async sendCampaign(campaignId: string): Promise<void> {
    await this.call('sendCampaign', () => this.http.post(`/campaigns/${campaignId}/actions/send`));
  }

  async deleteSegment(segmentId: string): Promise<void> {
    await this.call('deleteSegment', () => this.http.delete(`/lists/${this.options.listId}/segments/${segmentId}`));
  }
}
