import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/specs/**/*.spec.ts'],
        exclude: ['node_modules/', 'dist/'],
    },
    resolve: {
        alias: {
            '@proxy-sso/shared': path.resolve(__dirname, 'modules/shared/src'),
            '@proxy-sso/auth-saml': path.resolve(__dirname, 'modules/strategies/auth_saml/src'),
        },
    },
});
