// Loads .env before any module reads process.env; must stay the first import
import { initEnv } from '@exclusion/config';

initEnv();
