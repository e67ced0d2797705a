import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
    definition: {
        openapi: '3.0.0',
        info: {
            title: 'Wi-Fi Attendance API',
            version: '1.0.0',
            description: 'Classroom check-in service that credits attendance only to devices on the classroom network',
            license: {
                name: 'MIT',
                url: 'https://opensource.org/licenses/MIT'
            }
        },
        servers: [
            {
                url: 'http://localhost:3000/api',
                description: 'Development server'
            }
        ],
        components: {
            securitySchemes: {
                bearerAuth: {
                    type: 'http',
                    scheme: 'bearer',
                    bearerFormat: 'JWT'
                },
                routerKey: {
                    type: 'apiKey',
                    in: 'header',
                    name: 'x-router-key'
                }
            },
            schemas: {
                Fault: {
                    type: 'object',
                    properties: {
                        protocolVersion: {
                            type: 'integer',
                            example: 1
                        },
                        error: {
                            type: 'string',
                            enum: ['INVALID_ARGUMENT', 'NOT_FOUND', 'SERVICE_UNAVAILABLE', 'INTERNAL_ERROR']
                        },
                        message: {
                            type: 'string',
                            description: 'Error message'
                        }
                    }
                }
            }
        },
        security: [{
            bearerAuth: []
        }]
    },
    // Route files carry the @swagger blocks; .js once compiled
    apis: [path.join(__dirname, '../routes/*.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
