const jsonBody = (schema: object) => ({ 'application/json': { schema } });

const verifyResult = {
    type: 'object',
    properties: {
        status: { type: 'string', enum: ['SUCCESS', 'FAILED'] },
        message: { type: 'string' },
    },
    required: ['status', 'message'],
};

export const openapiSpec = {
    openapi: '3.0.3',
    info: {
        title: 'Attendance Code API',
        version: '0.1.0',
        description:
            'Publishes a rotating 8-character attendance code. Students submit the code to be marked present; the present list resets on every rotation.',
    },
    servers: [{ url: 'http://localhost:{port}', variables: { port: { default: '3000' } } }],
    components: {
        schemas: {
            Error: {
                type: 'object',
                properties: {
                    error: {
                        type: 'object',
                        properties: {
                            code: { type: 'string' },
                            message: { type: 'string' },
                        },
                        required: ['code', 'message'],
                    },
                },
                required: ['error'],
            },
            VerifyResult: verifyResult,
        },
    },
    paths: {
        '/': {
            get: {
                summary: 'Service status and endpoint index',
                responses: { '200': { description: 'Status, store connectivity and endpoints' } },
            },
        },
        '/health': {
            get: {
                summary: 'Health check',
                responses: { '200': { description: 'OK' } },
            },
        },
        '/api/get-current-code': {
            get: {
                summary: 'Current attendance code, rotated first when stale',
                responses: {
                    '200': {
                        description: 'Active code',
                        content: jsonBody({
                            type: 'object',
                            properties: { secret_code: { type: 'string', pattern: '^[A-Z0-9]{8}$' } },
                            required: ['secret_code'],
                        }),
                    },
                    '503': { description: 'Store unavailable', content: jsonBody({ $ref: '#/components/schemas/Error' }) },
                },
            },
        },
        '/api/verify-attendance': {
            post: {
                summary: 'Submit the current code to be marked present',
                requestBody: {
                    required: true,
                    content: jsonBody({
                        type: 'object',
                        properties: {
                            student_id: { oneOf: [{ type: 'string' }, { type: 'number' }] },
                            code: { type: 'string' },
                        },
                        required: ['student_id', 'code'],
                    }),
                },
                responses: {
                    '200': { description: 'Marked present', content: jsonBody({ $ref: '#/components/schemas/VerifyResult' }) },
                    '400': { description: 'Missing student_id or code', content: jsonBody({ $ref: '#/components/schemas/VerifyResult' }) },
                    '403': { description: 'Incorrect or expired code', content: jsonBody({ $ref: '#/components/schemas/VerifyResult' }) },
                    '429': { description: 'Rate limited', content: jsonBody({ $ref: '#/components/schemas/VerifyResult' }) },
                    '503': { description: 'Store unavailable', content: jsonBody({ $ref: '#/components/schemas/Error' }) },
                },
            },
        },
        '/api/get-attendance-log': {
            get: {
                summary: 'Identities present under the current code, sorted',
                responses: {
                    '200': {
                        description: 'Present students',
                        content: jsonBody({
                            type: 'object',
                            properties: { present_students: { type: 'array', items: { type: 'string' } } },
                            required: ['present_students'],
                        }),
                    },
                    '403': { description: 'Client address not whitelisted', content: jsonBody({ $ref: '#/components/schemas/Error' }) },
                    '503': { description: 'Store unavailable', content: jsonBody({ $ref: '#/components/schemas/Error' }) },
                },
            },
        },
    },
};
