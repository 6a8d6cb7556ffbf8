import {Hono} from 'hono';
import {movieStatuses} from '@theater/database';
import type {AppEnvironment} from '../types/environment';

const documentationRoutes = new Hono<AppEnvironment>();

const movieFields = `
        name:
          type: string
          maxLength: 255
        date:
          type: string
          format: date
          description: At most 365 days after today
        score:
          type: number
          minimum: 0
          maximum: 100
        overview:
          type: string
        status:
          type: string
          enum: [${movieStatuses.map(status => `'${status}'`).join(', ')}]
        budget:
          type: number
          minimum: 0
        revenue:
          type: number
          minimum: 0`;

documentationRoutes.get('/openapi.yml', async c => {
  const basePath = c.get('config').apiBasePath;
  const openapiSpec = `openapi: 3.0.3
info:
  title: Movie Theater API
  description: |
    Catalog of movies with their country, genres, actors and languages.
    Countries, genres, actors and languages are created on first reference.
  version: 1.0.0

servers:
  - url: ${new URL(c.req.url).origin}${basePath}
    description: Current server

paths:
  /movies/:
    get:
      summary: List movies
      operationId: listMovies
      tags: [Movies]
      parameters:
        - name: page
          in: query
          schema: {type: integer, minimum: 1, default: 1}
        - name: per_page
          in: query
          schema: {type: integer, minimum: 1, maximum: 20, default: 10}
      responses:
        '200':
          description: One page of movies, newest first
          content:
            application/json:
              schema: {$ref: '#/components/schemas/MovieList'}
        '404': {$ref: '#/components/responses/NotFound'}
        '422': {$ref: '#/components/responses/ValidationFailed'}
    post:
      summary: Create a movie
      operationId: createMovie
      tags: [Movies]
      requestBody:
        required: true
        content:
          application/json:
            schema: {$ref: '#/components/schemas/MovieCreate'}
      responses:
        '201':
          description: Created movie
          content:
            application/json:
              schema: {$ref: '#/components/schemas/MovieDetail'}
        '409': {$ref: '#/components/responses/Conflict'}
        '422': {$ref: '#/components/responses/ValidationFailed'}

  /movies/{id}/:
    parameters:
      - name: id
        in: path
        required: true
        schema: {type: integer, minimum: 1}
    get:
      summary: Get movie details
      operationId: getMovie
      tags: [Movies]
      responses:
        '200':
          description: Movie with its relations
          content:
            application/json:
              schema: {$ref: '#/components/schemas/MovieDetail'}
        '404': {$ref: '#/components/responses/NotFound'}
    patch:
      summary: Update movie fields
      description: Only the supplied fields change. Relations cannot be updated.
      operationId: updateMovie
      tags: [Movies]
      requestBody:
        required: true
        content:
          application/json:
            schema: {$ref: '#/components/schemas/MovieUpdate'}
      responses:
        '200':
          description: Movie updated
          content:
            application/json:
              schema:
                type: object
                properties:
                  detail: {type: string}
        '404': {$ref: '#/components/responses/NotFound'}
        '409': {$ref: '#/components/responses/Conflict'}
        '422': {$ref: '#/components/responses/ValidationFailed'}
    delete:
      summary: Delete a movie
      operationId: deleteMovie
      tags: [Movies]
      responses:
        '204':
          description: Movie deleted
        '404': {$ref: '#/components/responses/NotFound'}

components:
  schemas:
    Named:
      type: object
      properties:
        id: {type: integer}
        name: {type: string}
    Country:
      type: object
      properties:
        id: {type: integer}
        code: {type: string, pattern: '^[A-Z]{2,3}$'}
        name: {type: string, nullable: true}
    MovieListItem:
      type: object
      properties:
        id: {type: integer}
        name: {type: string}
        date: {type: string, format: date}
        score: {type: number}
        overview: {type: string}
    MovieList:
      type: object
      properties:
        movies:
          type: array
          items: {$ref: '#/components/schemas/MovieListItem'}
        prev_page: {type: string, nullable: true}
        next_page: {type: string, nullable: true}
        total_pages: {type: integer}
        total_items: {type: integer}
    MovieUpdate:
      type: object
      properties:${movieFields}
    MovieCreate:
      type: object
      required: [name, date, score, overview, status, budget, revenue, country, genres, actors, languages]
      properties:${movieFields}
        country:
          type: string
          pattern: '^[A-Z]{2,3}$'
        genres:
          type: array
          items: {type: string}
        actors:
          type: array
          items: {type: string}
        languages:
          type: array
          items: {type: string}
    MovieDetail:
      type: object
      properties:
        id: {type: integer}${movieFields}
        country: {$ref: '#/components/schemas/Country'}
        genres:
          type: array
          items: {$ref: '#/components/schemas/Named'}
        actors:
          type: array
          items: {$ref: '#/components/schemas/Named'}
        languages:
          type: array
          items: {$ref: '#/components/schemas/Named'}
    Error:
      type: object
      properties:
        error: {type: string}
        code: {type: string}
        details: {}
  responses:
    NotFound:
      description: Movie or page not found
      content:
        application/json:
          schema: {$ref: '#/components/schemas/Error'}
    Conflict:
      description: A movie with the same name and date exists
      content:
        application/json:
          schema: {$ref: '#/components/schemas/Error'}
    ValidationFailed:
      description: Field-level validation errors
      content:
        application/json:
          schema: {$ref: '#/components/schemas/Error'}
`;

  c.header('Content-Type', 'application/yaml; charset=utf-8');
  c.header('Cache-Control', 'public, max-age=3600');
  return c.body(openapiSpec, 200);
});

export {documentationRoutes};
