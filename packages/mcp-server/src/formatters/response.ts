/** Tool result: JSON text, or an error result carrying the message */
export function wrapResponse(result: unknown) {
  if (result instanceof Error) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify({ error: result.name, message: result.message }) }],
      isError: true,
    };
  }
  return {
    content: [{ type: "text" as const, text: typeof result === "string" ? result : JSON.stringify(result, null, 2) }],
  };
}

/** Run a handler and wrap its value, turning a throw into an error result */
export async function respond(handler: () => unknown | Promise<unknown>) {
  try {
    return wrapResponse(await handler());
  } catch (err) {
    return wrapResponse(err instanceof Error ? err : new Error(String(err)));
  }
}
