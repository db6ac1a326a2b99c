/**
 * MSW Request Handlers
 *
 * Default mocks for the external HTTP APIs (Exa, Jina). Tests override them
 * per case with `server.use(...)`.
 */

import { http, HttpResponse } from 'msw';

export const EXA_BASE_URL = 'https://api.exa.ai';
export const JINA_BASE_URL = 'https://api.jina.ai/v1';

export const MOCK_EXA_SEARCH_RESPONSE = {
  results: [
    { id: 'a', url: 'https://news-one.example.com/story', title: 'Council approves river bridge' },
    { id: 'b', url: 'https://news-two.example.org/bridge', title: 'Bridge vote passes' },
  ],
};

export const MOCK_EXA_CONTENTS_RESPONSE = {
  results: [
    {
      id: 'https://news-one.example.com/story',
      url: 'https://news-one.example.com/story',
      title: 'Council approves river bridge',
      author: 'Dana Reporter',
      text: '# Council approves river bridge\n\nThe council voted 7-2 on Tuesday.\n\nConstruction starts in spring.',
      image: 'https://cdn.example.com/bridge-hero.jpg',
      extras: { imageLinks: ['https://cdn.example.com/bridge-hero.jpg', 'https://cdn.example.com/council.jpg'] },
    },
  ],
  statuses: [{ id: 'https://news-one.example.com/story', status: 'success' }],
};

export const MOCK_JINA_EMBEDDING = [0.1, 0.2, 0.3];

export const handlers = [
  http.post(`${EXA_BASE_URL}/search`, () => HttpResponse.json(MOCK_EXA_SEARCH_RESPONSE)),
  http.post(`${EXA_BASE_URL}/contents`, () => HttpResponse.json(MOCK_EXA_CONTENTS_RESPONSE)),
  http.post(`${JINA_BASE_URL}/embeddings`, () =>
    HttpResponse.json({
      model: 'jina-clip-v2',
      object: 'list',
      data: [{ object: 'embedding', index: 0, embedding: MOCK_JINA_EMBEDDING }],
    })
  ),
];
