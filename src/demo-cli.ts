import { loadConfig } from './config';
import { runDemo } from './demo';

const { difficulty, demoNodes } = loadConfig();

runDemo({ difficulty, nodes: demoNodes });
