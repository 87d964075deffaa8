export const WATERMARK_STORE = Symbol('WATERMARK_STORE');

export interface WatermarkStore {
  load(job: string): Promise<Date | null>;
  save(job: string, watermark: Date): Promise<void>;
}

export class InMemoryWatermarkStore implements WatermarkStore {
  private readonly marks = new Map<string, Date>();

  async load(job: string): Promise<Date | null> {
    return this.marks.get(job) ?? null;
  }

  async save(job: string, watermark: Date): Promise<void> {
    this.marks.set(job, watermark);
  }
}
