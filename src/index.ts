#!/usr/bin/env node

import { run, handle } from '@oclif/core';

run()
  .then(() => {
    // CLI completed successfully
  })
  .catch(handle);
