// noinspection JSUnusedGlobalSymbols

declare namespace NodeJS {
    export interface ProcessEnv {
        NODE_ENV?: 'development' | 'production' | 'test';

        HTTP_HOST?: string;
        HTTP_PORT?: string;
        BODY_SIZE_LIMIT?: string;

        INITIAL_MATRIX?: string;
        INITIAL_MATRIX_FILE?: string;
        INVERSION_TOLERANCE?: string;

        LOG_LEVEL?: string;
    }
}
