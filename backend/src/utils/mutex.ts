//------------------------------------------------------------------------------//

/**
 * 프라미스 체인 기반 배타 잠금
 *
 * 저장소 단위의 거친 잠금(coarse-grained lock)으로 사용합니다.
 * 대기 중인 작업은 요청 순서(FIFO)대로 실행되며,
 * 앞선 작업이 실패해도 다음 작업은 그대로 진행됩니다.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * 잠금을 획득한 상태로 작업 실행
   */
  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    // 다음 작업은 현재 작업의 성공/실패와 무관하게 이어서 실행
    this.tail = result.then(
      () => this.release(),
      () => this.release()
    );
    return result;
  }

  /**
   * 잠금 보유 또는 대기 중인 작업이 있는지
   */
  get isLocked(): boolean {
    return this.pending > 0;
  }

  private release(): void {
    this.pending--;
  }
}
