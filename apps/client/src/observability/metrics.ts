/**
 * Dialog session metrics tracking
 */

export class Metrics {
  private framesReceived: number = 0;
  private framesDropped: number = 0;
  private audioBytesSent: number = 0;
  private audioBytesReceived: number = 0;
  private messagesProcessed: number = 0;
  private startTime: number = Date.now();

  /**
   * Count a decoded frame
   */
  frameReceived(): void {
    this.framesReceived++;
  }

  /**
   * Count a frame that failed to decode
   */
  frameDropped(): void {
    this.framesDropped++;
  }

  /**
   * Track microphone audio sent
   */
  audioSent(bytes: number): void {
    this.audioBytesSent += bytes;
  }

  /**
   * Track synthesized audio received
   */
  audioReceived(bytes: number): void {
    this.audioBytesReceived += bytes;
  }

  /**
   * Increment message count
   */
  messageProcessed(): void {
    this.messagesProcessed++;
  }

  /**
   * Get current metrics snapshot
   */
  getSnapshot() {
    const uptimeMs = Date.now() - this.startTime;
    const uptimeSec = Math.floor(uptimeMs / 1000);

    return {
      uptime: `${uptimeSec}s`,
      framesReceived: this.framesReceived,
      framesDropped: this.framesDropped,
      audioSent: this.formatBytes(this.audioBytesSent),
      audioReceived: this.formatBytes(this.audioBytesReceived),
      messagesProcessed: this.messagesProcessed,
    };
  }

  /**
   * Format bytes to human-readable
   */
  formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
  }

  /**
   * Print metrics to console
   */
  print(): void {
    const snapshot = this.getSnapshot();
    console.log("\nSession Metrics:");
    console.log(`  Uptime:              ${snapshot.uptime}`);
    console.log(`  Frames Received:     ${snapshot.framesReceived}`);
    console.log(`  Frames Dropped:      ${snapshot.framesDropped}`);
    console.log(`  Audio Sent:          ${snapshot.audioSent}`);
    console.log(`  Audio Received:      ${snapshot.audioReceived}`);
    console.log(`  Messages Processed:  ${snapshot.messagesProcessed}`);
    console.log();
  }
}

export const metrics = new Metrics();
