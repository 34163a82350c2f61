import fs from 'node:fs/promises';
import type { WalkFs } from './types';

export const nodeWalkFs: WalkFs = {
  readdir: (p) => fs.readdir(p, { withFileTypes: true }),
  stat: (p) => fs.stat(p),
  readFile: (p) => fs.readFile(p),
};
