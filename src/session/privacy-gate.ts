import type { PrivacyState } from "./session";

/**
 * In-memory write gate for a session. A write is allowed only while
 * recording is enabled and off-the-record is not engaged.
 */
export class PrivacyGate {
  private recordingEnabled: boolean;
  private offTheRecord = false;

  constructor(options: { optOut?: boolean } = {}) {
    this.recordingEnabled = options.optOut !== true;
  }

  isWriteAllowed(): boolean {
    return this.recordingEnabled && !this.offTheRecord;
  }

  denialReason(): "opted-out" | "off-the-record" | null {
    if (!this.recordingEnabled) {
      return "opted-out";
    }
    if (this.offTheRecord) {
      return "off-the-record";
    }
    return null;
  }

  setRecording(enabled: boolean): PrivacyState {
    const changed = this.recordingEnabled !== enabled;
    this.recordingEnabled = enabled;
    return this.snapshot(changed);
  }

  setOffTheRecord(enabled: boolean): PrivacyState {
    const changed = this.offTheRecord !== enabled;
    this.offTheRecord = enabled;
    return this.snapshot(changed);
  }

  snapshot(changed = false): PrivacyState {
    return {
      recordingEnabled: this.recordingEnabled,
      offTheRecord: this.offTheRecord,
      writeAllowed: this.isWriteAllowed(),
      changed,
    };
  }
}
