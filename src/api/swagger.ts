import { join } from 'path';
import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Ride Dispatch API',
      version: '1.0.0',
      description: 'Driver matching, carpool assignment and fare settlement',
      contact: {
        name: 'API Support'
      }
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server'
      }
    ],
    tags: [
      { name: 'Rides', description: 'Ride request and lifecycle endpoints' },
      { name: 'Riders', description: 'Rider registration endpoints' },
      { name: 'Drivers', description: 'Driver registration and availability endpoints' },
      { name: 'Dispatch', description: 'Dispatch status and hot-swappable policies' }
    ],
    components: {
      schemas: {
        Location: {
          type: 'object',
          required: ['latitude', 'longitude'],
          properties: {
            latitude: { type: 'number', example: 19.076 },
            longitude: { type: 'number', example: 72.8777 },
            address: { type: 'string', example: 'Bandra West' }
          }
        }
      }
    }
  },
  // route files sit beside this one, as .ts under ts-jest and .js once built
  apis: [join(__dirname, '*Routes.{ts,js}'), join(__dirname, 'routes.{ts,js}')]
};

export const swaggerSpec = swaggerJsdoc(options);
