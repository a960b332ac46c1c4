// 응답 스트림 중 종료 여부와 'close' 이벤트만 사용
export interface ClosableResponse {
  readonly writableFinished: boolean;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * 클라이언트 연결이 응답 완료 전에 끊기면 중단되는 신호
 * (Fastify에서는 reply.raw 전달)
 */
export function abortOnDisconnect(response: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  response.once('close', () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
