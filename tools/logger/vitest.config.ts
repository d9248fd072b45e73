import { defineConfig as defineBaseConfig } from '@figref/vitest-config';
import { defineConfig } from 'vitest/config';

export default defineConfig(defineBaseConfig());
