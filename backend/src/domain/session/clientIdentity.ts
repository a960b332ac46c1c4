import { createHash } from 'crypto';
//------------------------------------------------------------------------------//

/**
 * 클라이언트 식별자 생성 (IP + User-Agent 해시)
 *
 * 로그인 없이 같은 클라이언트의 요청을 묶기 위한 휴리스틱입니다.
 * 같은 프록시/NAT 뒤에서 User-Agent까지 같은 클라이언트는 하나로 취급됩니다.
 */
export function identifyClient(clientAddress: string, userAgent: string): string {
  return createHash('sha256').update(`${clientAddress}_${userAgent}`).digest('hex');
}
