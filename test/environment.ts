// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// keep test logs out of the user's home, must run before the constants are loaded
process.env.RINGKEEPER_HOME = fs.mkdtempSync(path.join(os.tmpdir(), 'ringkeeper-home-'));
