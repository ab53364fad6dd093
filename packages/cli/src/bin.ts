#!/usr/bin/env node

import { handleError } from './errors/index.js';
import { main } from './index.js';

main().catch(handleError);
