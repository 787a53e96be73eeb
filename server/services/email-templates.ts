import type { ListingRecord } from '@shared/schema';

/**
 * HTML for the alert campaign body. The platform template supplies the
 * frame; this fills the listings block.
 */

export const LISTINGS_PLACEHOLDER = '*|TEMP_HTML|*';
export const DESCRIPTION_LIMIT = 300;

const COLORS = {
  accent: '#007cba',
  textPrimary: '#333333',
  textSecondary: '#666666',
  border: '#e0e0e0',
  cardBg: '#fafafa',
  emptyBg: '#f9f9f9',
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

export function formatPrice(price: number | null): string {
  if (price === null) return 'N/A';
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: 'USD',
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  }).format(price);
}

export function truncate(text: string, limit = DESCRIPTION_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

function field(label: string, value: string, size = 16): string {
  return `
      <div style="margin-bottom: 15px;">
        <p style="text-align: left; margin: 0 0 5px 0; font-weight: bold; color: ${COLORS.accent}; font-size: 16px;">${label}</p>
        <p style="text-align: left; margin: 0 0 15px 0; font-size: ${size}px; color: ${COLORS.textPrimary};">${escapeHtml(value)}</p>
      </div>`;
}

export function listingCard(listing: ListingRecord, rank: number): string {
  return `
    <div style="margin-bottom: 20px;">
      <h2 style="color: ${COLORS.accent}; font-size: 20px; margin: 0 0 10px 0;">Business Opportunity #${rank}</h2>
      <div style="margin-bottom: 30px; padding: 20px; border: 2px solid ${COLORS.border}; border-radius: 8px; background-color: ${COLORS.cardBg};">
        ${field('TITLE', listing.title, 18)}
        ${field('ASKING PRICE', formatPrice(listing.asking_price))}
        ${field('Sellers Discretionary Earnings (SDE):', listing.cashflow ?? 'N/A')}
        ${field("BROKER'S NAME", listing.broker_name ?? 'N/A')}
        ${field("BROKER'S PHONE", listing.broker_phone ?? 'N/A')}
        ${field('DESCRIPTION', truncate(listing.description ?? 'N/A'), 14)}
        <p style="text-align: left; margin: 0; font-size: 16px;">
          <a href="${escapeHtml(listing.url)}" target="_blank" style="color: ${COLORS.accent}; text-decoration: none; font-weight: bold;">View Full Details &rarr;</a>
        </p>
      </div>
    </div>`;
}

export function emptyState(): string {
  return `
    <div style="text-align: center; padding: 20px; background-color: ${COLORS.emptyBg}; border-radius: 5px;">
      <p style="color: ${COLORS.textSecondary}; font-size: 16px; margin: 0;">No new listings match your criteria at this time.</p>
      <p style="color: ${COLORS.textSecondary}; font-size: 14px; margin: 10px 0 0 0;">We'll notify you when new opportunities become available!</p>
    </div>`;
}

export function renderListingsHtml(listings: ListingRecord[]): string {
  if (listings.length === 0) return emptyState();
  return listings.map((listing, index) => listingCard(listing, index + 1)).join('');
}

/**
 * Puts the listings block where the template's placeholder is, or on top
 * when the template has none.
 */
export function fillTemplate(templateHtml: string, listingsHtml: string): string {
  if (!templateHtml.includes(LISTINGS_PLACEHOLDER)) {
    return listingsHtml + templateHtml;
  }
  return templateHtml.split(LISTINGS_PLACEHOLDER).join(listingsHtml);
}

export function subjectLine(subject: string, count: number): string {
  return `${subject} - ${count} New Listing${count === 1 ? '' : 's'}`;
}
