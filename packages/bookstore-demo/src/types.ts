export interface Book {
  id: string;
  title: string;
  author: string;
  addedBy: string;
}

export interface NewBook {
  title: string;
  author: string;
}

// Caller identity, taken from request headers
export interface Actor {
  name: string;
  roles: string[];
}

// Transport-neutral response produced by the controller
export interface HttpResult {
  status: number;
  body?: unknown;
}
