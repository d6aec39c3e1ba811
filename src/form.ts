const escapeAttribute = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");

// Landing page shown when no ?url= is given; submits back to the same path.
export const renderForm = (scriptPath: string): string => `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Web Proxy</title>
  <style>
    body { font-family: system-ui, sans-serif; display: flex; justify-content: center; padding-top: 15vh; margin: 0; }
    form { display: flex; gap: 0.5rem; width: min(40rem, 90vw); }
    input { flex: 1; padding: 0.6rem 0.8rem; font-size: 1rem; }
    button { padding: 0.6rem 1.2rem; font-size: 1rem; }
  </style>
</head>
<body>
  <form action="${escapeAttribute(scriptPath)}" method="GET">
    <input type="text" name="url" placeholder="https://example.com" required autofocus>
    <button type="submit">Go</button>
  </form>
</body>
</html>
`;
