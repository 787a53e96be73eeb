import type { ListingRecord, MatchGroup, NotificationSummary, SubscriberProfile } from '@shared/schema';
import type { NotifyConfig } from '../config';
import { log, logWarn, logError, errorMessage } from '../log';
import { fillTemplate, renderListingsHtml, subjectLine } from './email-templates';
import type { CampaignPlatform } from './mailchimp-client';
import { groupSubscribers, matchSubscribers, toSubscriberProfile } from './subscriber-matcher';

export interface NotificationOptions extends NotifyConfig {
  now?: () => Date;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** 2025-03-07 14:05:09 -> "20250307-140509" */
export function compactStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

function readableStamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function segmentName(groupKey: string, at: Date): string {
  return `alerts-group-${groupKey.slice(0, 8)}-${compactStamp(at)}`;
}

const EMPTY_SUMMARY: NotificationSummary = {
  matchedSubscribers: 0,
  emailsSent: 0,
  groupsCreated: 0,
  groupsFailed: 0,
};

/**
 * Notification fan-out: one campaign per group of subscribers whose
 * matched listings are identical.
 */
export class NotificationService {
  private readonly now: () => Date;

  constructor(private readonly platform: CampaignPlatform, private readonly options: NotificationOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async loadProfiles(): Promise<SubscriberProfile[]> {
    const members = await this.platform.fetchMembers();
    return members.flatMap(member => {
      const profile = toSubscriberProfile(member);
      return profile ? [profile] : [];
    });
  }

  async notify(listings: ListingRecord[]): Promise<NotificationSummary> {
    if (listings.length === 0) {
      log('No new listings, nothing to send', 'NOTIFY');
      return { ...EMPTY_SUMMARY };
    }

    let profiles: SubscriberProfile[];
    try {
      profiles = await this.loadProfiles();
    } catch (error) {
      logError('Could not fetch subscribers', 'NOTIFY', error);
      return { ...EMPTY_SUMMARY };
    }

    const matches = matchSubscribers(profiles, listings);
    if (matches.size === 0) {
      log('No matched subscribers for recent listings', 'NOTIFY');
      return { ...EMPTY_SUMMARY };
    }
    log(`Found ${matches.size} subscribers with matching listings`, 'NOTIFY');

    const groups = groupSubscribers(matches);
    log(`Grouped subscribers into ${groups.length} segments`, 'NOTIFY');

    const summary: NotificationSummary = { ...EMPTY_SUMMARY, matchedSubscribers: matches.size };

    for (const group of groups) {
      if (await this.dispatchGroup(group)) {
        summary.emailsSent += group.subscriberEmails.length;
        summary.groupsCreated++;
      } else {
        summary.groupsFailed++;
      }
    }

    log(`Sent emails to ${summary.emailsSent} subscribers across ${summary.groupsCreated} segments` +
      (summary.groupsFailed > 0 ? `, ${summary.groupsFailed} failed` : ''), 'NOTIFY');
    return summary;
  }

  /**
   * Segment, campaign, content, send. False when any step fails.
   */
  async dispatchGroup(group: MatchGroup): Promise<boolean> {
    const at = this.now();
    const recipients = group.subscriberEmails.length;
    const label = group.groupKey.slice(0, 8);
    log(`Processing group ${label}: ${recipients} subscribers, ${group.listings.length} listings`, 'NOTIFY');

    let segmentId: string | null = null;
    try {
      segmentId = await this.platform.createSegment(segmentName(group.groupKey, at), group.subscriberEmails);

      const campaignId = await this.platform.createCampaign({
        segmentId,
        subject: subjectLine(this.options.subject, group.listings.length),
        title: `Business Alerts Group - ${readableStamp(at)} (${recipients} recipients)`,
        fromName: this.options.fromName,
        replyTo: this.options.replyTo,
      });

      const templateHtml = await this.platform.getCampaignHtml(campaignId);
      await this.platform.setCampaignHtml(campaignId, fillTemplate(templateHtml, renderListingsHtml(group.listings)));
      await this.platform.sendCampaign(campaignId);

      log(`✅ Sent campaign ${campaignId} to segment ${segmentId} (${recipients} recipients)`, 'NOTIFY');
      return true;
    } catch (error) {
      logError(`Group ${label} failed`, 'NOTIFY', error);
      return false;
    } finally {
      if (segmentId !== null && this.options.cleanupSegments) {
        await this.cleanupSegment(segmentId);
      }
    }
  }

  private async cleanupSegment(segmentId: string): Promise<void> {
    try {
      await this.platform.deleteSegment(segmentId);
      log(`Cleaned up segment ${segmentId}`, 'NOTIFY');
    } catch (error) {
      logWarn(`Could not clean up segment ${segmentId}: ${errorMessage(error)}`, 'NOTIFY');
    }
  }
}
