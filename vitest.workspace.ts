import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['sdk', 'keeper']);
