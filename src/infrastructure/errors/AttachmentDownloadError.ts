/**
 * Attachment download failed or was refused (e.g. over the size guard).
 */
export class AttachmentDownloadError extends Error {
  constructor(
    public readonly ticketId: number,
    public readonly articleId: number,
    public readonly attachmentId: number,
    public readonly reason: string
  ) {
    super(`Failed to download attachment ${attachmentId} for ticket ${ticketId} article ${articleId}: ${reason}`);
    this.name = 'AttachmentDownloadError';
  }
}
