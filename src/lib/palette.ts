/** Terminal colors shared by the monitor components. */
export const colors = {
  accent: "cyan",
  success: "green",
  warning: "yellow",
  error: "red",
  border: "gray",
  incoming: "blue",
  outgoing: "magenta",
} as const;
