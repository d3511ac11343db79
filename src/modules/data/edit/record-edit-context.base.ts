import {
  getRecordMetadata,
  readRecordKey,
  recordProperties,
  type RecordType,
} from '../../../lib/cqs';

export type FieldChangedListener = (fieldName: string) => void;
export type EditStateListener = (isDirty: boolean) => void;

/**
 * Editable copy of a record that remembers what it was loaded from.
 *
 * Subclasses hold one field per editable property, build the current record
 * in `record` and route setters through `setField` so listeners hear about
 * every change. They must call `load` from their own constructor.
 */
export abstract class RecordEditContextBase<T extends object> {
  protected baseRecord: T;
  private readonly fieldListeners = new Set<FieldChangedListener>();
  private readonly stateListeners = new Set<EditStateListener>();

  protected constructor(
    protected readonly recordType: RecordType<T>,
    record: T,
  ) {
    this.baseRecord = record;
  }

  /** The record as currently edited. */
  public abstract get record(): T;

  /** Replace the edited values and the base record with `record`. */
  public abstract load(record: T, notify?: boolean): void;

  /** Copy of the current values under a fresh key. */
  public abstract asNewRecord(): T;

  public get original(): T {
    return this.baseRecord;
  }

  public get isDirty(): boolean {
    const current = this.record;
    return recordProperties(this.recordType).some(
      (prop) =>
        !Object.is(Reflect.get(this.baseRecord, prop), Reflect.get(current, prop)),
    );
  }

  public get isNew(): boolean {
    const { key } = getRecordMetadata(this.recordType);
    const value = readRecordKey(this.baseRecord, key);
    return value === undefined || value === null || value === '';
  }

  public reset(): void {
    this.load(this.baseRecord);
  }

  public setAsSaved(): void {
    this.load(this.record);
  }

  /** Returns a function that removes the listener. */
  public onFieldChanged(listener: FieldChangedListener): () => void {
    this.fieldListeners.add(listener);
    return () => this.fieldListeners.delete(listener);
  }

  public onEditStateChanged(listener: EditStateListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  protected notifyFieldChanged(fieldName: string): void {
    for (const listener of this.fieldListeners) listener(fieldName);
    const dirty = this.isDirty;
    for (const listener of this.stateListeners) listener(dirty);
  }

  /** Assigns and notifies only when `value` differs from `current`. */
  protected setField<V>(
    fieldName: string,
    current: V,
    value: V,
    assign: (value: V) => void,
  ): boolean {
    if (Object.is(current, value)) return false;
    assign(value);
    this.notifyFieldChanged(fieldName);
    return true;
  }
}
