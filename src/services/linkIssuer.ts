/**
 * Link Issuer
 * Issues single-use verification links bound to a customer and an expiry.
 * Links are never deleted: consumed and superseded links stay in the store for audit.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ErrorCode, LinkError } from '../errors/vkycErrors';
import { Repository } from '../stores/repository';
import { LinkResolution, SessionMode, VerificationLink } from '../types/vkyc.types';

export interface IssueLinkOptions {
  ttlMs?: number;
  expiresAt?: Date;
  sessionId?: string;
  scheduledAt?: Date;
}

type LinkIssuerEvents = {
  linkIssued: [link: VerificationLink];
};

export class LinkIssuer extends EventEmitter<LinkIssuerEvents> {
  constructor(
    private readonly links: Repository<VerificationLink>,
    private readonly options: {
      baseUrl: string;
      defaultTtlMs: number;
      now?: () => Date;
    },
  ) {
    super();
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  /**
   * Issue a new link. The link is only emitted; delivery to the customer is someone else's job.
   */
  async issue(customerId: string, options: IssueLinkOptions = {}): Promise<VerificationLink> {
    if (!customerId || !customerId.trim()) {
      throw new Error('customerId is required to issue a link');
    }

    const issuedAt = this.now();
    const expiresAt = options.expiresAt
      ?? new Date(issuedAt.getTime() + (options.ttlMs ?? this.options.defaultTtlMs));

    if (expiresAt.getTime() <= issuedAt.getTime()) {
      throw new Error('Link expiry must be in the future');
    }

    const token = uuidv4();
    const link: VerificationLink = {
      token,
      customerId,
      url: this.buildUrl(token, options.sessionId),
      issuedAt,
      expiresAt,
      consumed: false,
      sessionId: options.sessionId,
      scheduledAt: options.scheduledAt,
    };

    await this.links.put(token, link);
    console.log(`[LinkIssuer] Link issued for customer ${customerId}, expires ${expiresAt.toISOString()}`);

    this.emit('linkIssued', link);
    return link;
  }

  private buildUrl(token: string, sessionId?: string): string {
    const url = `${this.options.baseUrl}/vkyc/${token}`;
    return sessionId ? `${url}?session_id=${encodeURIComponent(sessionId)}` : url;
  }

  async get(token: string): Promise<VerificationLink | undefined> {
    return this.links.get(token);
  }

  /**
   * Load a link and check that it can still be used
   */
  async requireUsable(token: string): Promise<VerificationLink> {
    const link = await this.links.get(token);
    if (!link) {
      throw new LinkError(ErrorCode.LinkNotFound, 'Verification link not found');
    }
    if (link.supersededBy) {
      throw new LinkError(ErrorCode.LinkSuperseded, 'This link was replaced by a newer one');
    }
    if (link.consumed) {
      throw new LinkError(ErrorCode.LinkAlreadyConsumed, 'This link has already been used');
    }
    if (this.isExpired(link)) {
      throw new LinkError(ErrorCode.LinkExpired, 'This link has expired');
    }
    return link;
  }

  /**
   * Resolve a link into the options offered to the user
   */
  async resolve(token: string): Promise<LinkResolution> {
    const link = await this.requireUsable(token);

    // A link issued for a scheduled occurrence has its mode fixed already
    const modeOptions: SessionMode[] = link.scheduledAt ? [] : ['immediate', 'scheduled'];

    return {
      token: link.token,
      customerId: link.customerId,
      expiresAt: link.expiresAt,
      modeOptions,
      sessionId: link.sessionId,
      scheduledAt: link.scheduledAt,
    };
  }

  isExpired(link: VerificationLink): boolean {
    return this.now().getTime() >= link.expiresAt.getTime();
  }

  async bindSession(token: string, sessionId: string): Promise<VerificationLink> {
    const link = await this.requireExisting(token);
    link.sessionId = sessionId;
    await this.links.put(token, link);
    return link;
  }

  /**
   * Mark a link consumed. Repeating the call is a no-op.
   */
  async markConsumed(token: string): Promise<VerificationLink> {
    const link = await this.requireExisting(token);
    if (link.consumed) {
      return link;
    }

    link.consumed = true;
    link.consumedAt = this.now();
    await this.links.put(token, link);
    console.log(`[LinkIssuer] Link consumed: ${token}`);
    return link;
  }

  async supersede(oldToken: string, newToken: string): Promise<void> {
    const link = await this.requireExisting(oldToken);
    link.supersededBy = newToken;
    await this.links.put(oldToken, link);
  }

  private async requireExisting(token: string): Promise<VerificationLink> {
    const link = await this.links.get(token);
    if (!link) {
      throw new LinkError(ErrorCode.LinkNotFound, 'Verification link not found');
    }
    return link;
  }
}
