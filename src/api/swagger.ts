import { OpenAPIV3 } from 'openapi-types';

const activityNameParameter: OpenAPIV3.ParameterObject = {
  name: 'name',
  in: 'path',
  required: true,
  description: 'Exact activity name, e.g. "Chess Club"',
  schema: { type: 'string' }
};

const emailQueryParameter: OpenAPIV3.ParameterObject = {
  name: 'email',
  in: 'query',
  required: true,
  description: 'Student email address',
  schema: { type: 'string' }
};

const descendingParameter: OpenAPIV3.ParameterObject = {
  name: 'descending',
  in: 'query',
  description: 'Reverse the sort order; ties keep their original order',
  schema: { type: 'boolean', default: false }
};

const messageResponse: OpenAPIV3.ResponseObject = {
  description: 'Confirmation message',
  content: {
    'application/json': {
      schema: { $ref: '#/components/schemas/Message' }
    }
  }
};

const errorResponse = (description: string): OpenAPIV3.ResponseObject => ({
  description,
  content: {
    'application/json': {
      schema: { $ref: '#/components/schemas/Error' }
    }
  }
});

export const swaggerDocument: OpenAPIV3.Document = {
  openapi: '3.0.0',
  info: {
    title: 'Mergington High School API',
    version: '1.0.0',
    description: 'API for viewing and signing up for extracurricular activities, uploading achievement documents and ranking activities and participants'
  },
  servers: [
    {
      url: 'http://localhost:8000',
      description: 'Local development server'
    }
  ],
  paths: {
    '/activities': {
      get: {
        tags: ['Activities'],
        summary: 'Get all activities keyed by name',
        responses: {
          '200': {
            description: 'Activity map',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  additionalProperties: { $ref: '#/components/schemas/Activity' }
                }
              }
            }
          }
        }
      }
    },
    '/activities/sorted': {
      get: {
        tags: ['Activities'],
        summary: 'Get activities sorted by name, number of participants, or average verified score',
        parameters: [
          {
            name: 'sort_by',
            in: 'query',
            schema: { type: 'string', default: 'name', enum: ['name', 'participants', 'score'] }
          },
          descendingParameter
        ],
        responses: {
          '200': {
            description: 'Sorted activities',
            content: {
              'application/json': {
                schema: { type: 'array', items: { $ref: '#/components/schemas/ActivityView' } }
              }
            }
          },
          '422': errorResponse('Invalid sort_by or descending value')
        }
      }
    },
    '/activities/{name}/signup': {
      post: {
        tags: ['Enrollment'],
        summary: 'Sign up a student for an activity',
        parameters: [activityNameParameter, emailQueryParameter],
        responses: {
          '200': messageResponse,
          '400': errorResponse('Student is already signed up'),
          '404': errorResponse('Activity not found'),
          '422': errorResponse('Missing email')
        }
      }
    },
    '/activities/{name}/unregister': {
      delete: {
        tags: ['Enrollment'],
        summary: 'Unregister a student from an activity',
        parameters: [activityNameParameter, emailQueryParameter],
        responses: {
          '200': messageResponse,
          '400': errorResponse('Student is not signed up for this activity'),
          '404': errorResponse('Activity not found'),
          '422': errorResponse('Missing email')
        }
      }
    },
    '/activities/{name}/upload': {
      post: {
        tags: ['Documents'],
        summary: 'Upload a certificate or score for an activity (file contents are discarded)',
        parameters: [activityNameParameter],
        requestBody: {
          required: true,
          content: {
            'multipart/form-data': {
              schema: {
                type: 'object',
                required: ['email', 'file', 'score'],
                properties: {
                  email: { type: 'string' },
                  file: { type: 'string', format: 'binary' },
                  score: { type: 'integer' }
                }
              }
            }
          }
        },
        responses: {
          '200': messageResponse,
          '404': errorResponse('Activity not found'),
          '422': errorResponse('Missing or invalid form field')
        }
      }
    },
    '/activities/{name}/documents': {
      get: {
        tags: ['Documents'],
        summary: 'Get all uploaded documents for an activity',
        parameters: [activityNameParameter],
        responses: {
          '200': {
            description: 'Documents in upload order',
            content: {
              'application/json': {
                schema: { type: 'array', items: { $ref: '#/components/schemas/Document' } }
              }
            }
          },
          '404': errorResponse('Activity not found')
        }
      }
    },
    '/activities/{name}/verify': {
      post: {
        tags: ['Documents'],
        summary: 'Verify the first document matching email and filename',
        parameters: [
          activityNameParameter,
          emailQueryParameter,
          { name: 'filename', in: 'query', required: true, schema: { type: 'string' } }
        ],
        responses: {
          '200': messageResponse,
          '404': errorResponse('Document not found'),
          '422': errorResponse('Missing email or filename')
        }
      }
    },
    '/activities/{name}/participants/sorted': {
      get: {
        tags: ['Activities'],
        summary: 'Get participants of an activity sorted by email or first verified score',
        parameters: [
          activityNameParameter,
          {
            name: 'sort_by',
            in: 'query',
            schema: { type: 'string', default: 'name', enum: ['name', 'score'] }
          },
          descendingParameter
        ],
        responses: {
          '200': {
            description: 'Sorted participants',
            content: {
              'application/json': {
                schema: { type: 'array', items: { $ref: '#/components/schemas/ParticipantScore' } }
              }
            }
          },
          '404': errorResponse('Activity not found'),
          '422': errorResponse('Invalid sort_by or descending value')
        }
      }
    },
    '/health': {
      get: {
        tags: ['System'],
        summary: 'Liveness check',
        responses: {
          '200': { description: 'Service is up' }
        }
      }
    }
  },
  components: {
    schemas: {
      Activity: {
        type: 'object',
        properties: {
          description: { type: 'string' },
          schedule: { type: 'string' },
          max_participants: { type: 'integer' },
          participants: { type: 'array', items: { type: 'string' } }
        }
      },
      ActivityView: {
        allOf: [
          { type: 'object', properties: { name: { type: 'string' } } },
          { $ref: '#/components/schemas/Activity' }
        ]
      },
      Document: {
        type: 'object',
        properties: {
          email: { type: 'string' },
          filename: { type: 'string' },
          content_type: { type: 'string' },
          score: { type: 'integer' },
          verified: { type: 'boolean' }
        }
      },
      ParticipantScore: {
        type: 'object',
        properties: {
          email: { type: 'string' },
          score: { type: 'integer', nullable: true }
        }
      },
      Message: {
        type: 'object',
        properties: {
          message: { type: 'string' }
        }
      },
      Error: {
        type: 'object',
        properties: {
          status: { type: 'string' },
          error: { type: 'string' },
          details: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                field: { type: 'string' },
                location: { type: 'string' },
                message: { type: 'string' }
              }
            }
          }
        }
      }
    }
  }
};
