import { fileURLToPath } from 'url';
import path from 'path';
//------------------------------------------------------------------------------//
const __filename: string = fileURLToPath(import.meta.url);
export const __dirname: string = path.dirname(__filename);

// tsc 빌드 시: dist/backend/src/utils → ../../../../ = 프로젝트 루트
// tsx 개발 실행 시: backend/src/utils → ../../ = backend/
const isInDist = __dirname.split(path.sep).includes('dist');
export const backendRoot: string = isInDist
  ? path.join(__dirname, '../../../../backend') // 빌드: dist/backend/src/utils → backend
  : path.join(__dirname, '../../'); // 개발: src/utils → backend
export const projectRoot: string = path.join(backendRoot, '../');
