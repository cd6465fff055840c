import { describe, expect, it } from 'vitest';
import { renderGraphiQL } from '../src/graphiql';

describe('renderGraphiQL', () => {
  it('points the fetcher at the endpoint', () => {
    const html = renderGraphiQL({ endpoint: '/api/graphql' });

    expect(html).toContain('const ENDPOINT = "/api/graphql";');
    expect(html).toContain('GraphiQL.createFetcher({ url: ENDPOINT })');
  });

  it('loads the requested GraphiQL version', () => {
    const html = renderGraphiQL({ version: '3.7.1' });

    expect(html).toContain('<script crossorigin src="https://cdn.jsdelivr.net/npm/graphiql@3.7.1/graphiql.min.js"></script>');
    expect(html).toContain('<link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/graphiql@3.7.1/graphiql.min.css" />');
  });

  it('prefills the operation', () => {
    const html = renderGraphiQL({
      query: 'query Op($id: ID) { node(id: $id) }',
      variables: { id: '1' },
      operationName: 'Op',
      result: '{"data":null}',
    });

    expect(html).toContain('const QUERY = "query Op($id: ID) { node(id: $id) }";');
    expect(html).toContain('const VARIABLES = "{\\n  \\"id\\": \\"1\\"\\n}";');
    expect(html).toContain('const OPERATION_NAME = "Op";');
    expect(html).toContain('const RESULT = "{\\"data\\":null}";');
  });

  it('keeps embedded values from closing the script', () => {
    const html = renderGraphiQL({ query: '# </script><script>alert(1)</script>' });

    expect(html).toContain('const QUERY = "# \\u003c/script>\\u003cscript>alert(1)\\u003c/script>";');
  });

  it('escapes the title', () => {
    expect(renderGraphiQL({ title: 'Q&A <api>' })).toContain('<title>Q&amp;A &lt;api&gt;</title>');
  });
});
