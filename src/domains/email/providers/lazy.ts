/**
 * @fileoverview Gateway that opens its underlying gateway on first use.
 *
 * Commands validate their input before making any call, so a command that
 * fails validation never loads credentials at all.
 */

import type { GmailGateway, Label, LabelChange, MessageFormat, MessageListPage, MessageRef, RawMessage } from '../types.js';

export class LazyGmailGateway implements GmailGateway {
  private pending: Promise<GmailGateway> | null = null;

  constructor(private readonly open: () => Promise<GmailGateway>) {}

  private target(): Promise<GmailGateway> {
    if (!this.pending) {
      this.pending = this.open();
    }
    return this.pending;
  }

  async listMessages(query: string, maxResults: number, pageToken?: string): Promise<MessageListPage> {
    return (await this.target()).listMessages(query, maxResults, pageToken);
  }

  async getMessage(id: string, format: MessageFormat): Promise<RawMessage> {
    return (await this.target()).getMessage(id, format);
  }

  async sendRaw(raw: string): Promise<MessageRef> {
    return (await this.target()).sendRaw(raw);
  }

  async listLabels(): Promise<Label[]> {
    return (await this.target()).listLabels();
  }

  async createLabel(name: string): Promise<Label> {
    return (await this.target()).createLabel(name);
  }

  async modifyMessage(id: string, change: LabelChange): Promise<void> {
    return (await this.target()).modifyMessage(id, change);
  }

  async batchModify(ids: string[], change: LabelChange): Promise<void> {
    return (await this.target()).batchModify(ids, change);
  }
}
