/**
 * Mock Enumerator for Testing
 * SOLID: Liskov Substitution - can replace a platform enumerator in tests
 */

export class MockEnumerator<R> {
  private devices: R[];
  private error: Error | null = null;
  public calls = 0;

  constructor(devices: R[] = []) {
    this.devices = devices;
  }

  /**
   * Pass this to a scanner; counts every call
   */
  enumerate = async (): Promise<R[]> => {
    this.calls++;
    if (this.error) throw this.error;
    return [...this.devices];
  };

  // Helper to update mock state during test
  setDevices(devices: R[]): void {
    this.devices = devices;
  }

  /**
   * Make every following call reject with the error
   */
  fail(error: Error): void {
    this.error = error;
  }

  recover(): void {
    this.error = null;
  }

  reset(): void {
    this.calls = 0;
  }
}
