/**
 * Keyed scratch data carried by scenes and generators between beats
 */
export class DataStore<TData extends object> {
  private data: Partial<TData> = {};

  /**
   * Merge the given values into the store
   */
  setData(values: Partial<TData>): void {
    this.data = { ...this.data, ...values };
  }

  getData<K extends keyof TData>(key: K): TData[K] | undefined {
    return this.data[key];
  }

  /**
   * Replace an existing value with `fn(value)`; missing keys are left alone
   */
  updateData<K extends keyof TData>(key: K, fn: (value: TData[K]) => TData[K]): void {
    const current = this.data[key];
    if (current === undefined) return;
    this.data = { ...this.data, [key]: fn(current) };
  }
}
