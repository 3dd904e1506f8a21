import './env-bootstrap.js';
import { buildProgram } from './program.js';

await buildProgram().parseAsync(process.argv);
