/**
 * GraphiQL integration.
 *
 * Renders the interactive IDE, prefilled with the current operation and,
 * when one was executed, its result.
 */

export interface GraphiQLConfig {
  /**
   * GraphQL endpoint the IDE sends operations to.
   * @default '/graphql'
   */
  readonly endpoint?: string;

  /**
   * GraphiQL version loaded from jsDelivr.
   * @default '3'
   */
  readonly version?: string;

  readonly query?: string;
  readonly variables?: Readonly<Record<string, unknown>>;
  readonly operationName?: string;

  /**
   * Encoded JSON result to show in the response pane.
   */
  readonly result?: string;

  /**
   * Page title.
   * @default 'GraphiQL'
   */
  readonly title?: string;
}

/**
 * Serializes a value for inline script use. `<` is escaped so the value
 * cannot terminate the script element.
 */
function scriptValue(value: unknown): string {
  return (JSON.stringify(value) ?? 'undefined')
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

/**
 * Generates the GraphiQL HTML page.
 */
export function renderGraphiQL(config: GraphiQLConfig = {}): string {
  const {
    endpoint = '/graphql',
    version = '3',
    query,
    variables,
    operationName,
    result,
    title = 'GraphiQL',
  } = config;

  const cdn = `https://cdn.jsdelivr.net/npm/graphiql@${encodeURIComponent(version)}`;
  const variablesText = variables ? JSON.stringify(variables, null, 2) : undefined;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <link rel="stylesheet" href="${cdn}/graphiql.min.css" />
  <style>
    html, body, #graphiql {
      height: 100%;
      margin: 0;
      width: 100%;
    }
  </style>
</head>
<body>
  <div id="graphiql">Loading...</div>

  <script crossorigin src="https://cdn.jsdelivr.net/npm/react@18/umd/react.production.min.js"></script>
  <script crossorigin src="https://cdn.jsdelivr.net/npm/react-dom@18/umd/react-dom.production.min.js"></script>
  <script crossorigin src="${cdn}/graphiql.min.js"></script>

  <script>
    const ENDPOINT = ${scriptValue(endpoint)};
    const QUERY = ${scriptValue(query)};
    const VARIABLES = ${scriptValue(variablesText)};
    const OPERATION_NAME = ${scriptValue(operationName)};
    const RESULT = ${scriptValue(result)};

    // Keep the address bar in sync so the current operation can be shared
    function updateURL(params) {
      const search = new URLSearchParams(window.location.search);
      for (const [key, value] of Object.entries(params)) {
        if (value) {
          search.set(key, value);
        } else {
          search.delete(key);
        }
      }
      history.replaceState(null, '', window.location.pathname + '?' + search);
    }

    const fetcher = GraphiQL.createFetcher({ url: ENDPOINT });

    const root = ReactDOM.createRoot(document.getElementById('graphiql'));
    root.render(
      React.createElement(GraphiQL, {
        fetcher: fetcher,
        query: QUERY,
        variables: VARIABLES,
        operationName: OPERATION_NAME,
        response: RESULT,
        onEditQuery: (value) => updateURL({ query: value }),
        onEditVariables: (value) => updateURL({ variables: value }),
        onEditOperationName: (value) => updateURL({ operationName: value }),
      })
    );
  </script>
</body>
</html>`;
}

/**
 * Helper to escape HTML special characters.
 */
function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
