/**
 * Dependency Injection Container
 *
 * サービスとUse Caseの依存関係を管理
 */
export class DIContainer {
  private static instance: DIContainer;
  private services = new Map<string, unknown>();

  private constructor() {
    // private constructor for singleton
  }

  static getInstance(): DIContainer {
    if (!DIContainer.instance) {
      DIContainer.instance = new DIContainer();
    }
    return DIContainer.instance;
  }

  /**
   * サービスを登録
   */
  register<T>(name: string, service: T): void {
    this.services.set(name, service);
  }

  /**
   * サービスを解決
   *
   * 登録時の型を呼び出し側が指定する（名前と型の対応は setupContainer が保証）
   */
  resolve<T>(name: string): T {
    if (!this.services.has(name)) {
      throw new Error(`Service not found: ${name}`);
    }
    return this.services.get(name) as T;
  }

  /**
   * サービスの存在確認
   */
  has(name: string): boolean {
    return this.services.has(name);
  }
}
