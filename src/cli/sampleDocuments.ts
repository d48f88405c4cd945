export interface SampleDocument {
  title: string;
  content: string;
}

export const SAMPLE_DOCUMENTS: readonly SampleDocument[] = [
  {
    title: "Introduction to TypeScript",
    content:
      "TypeScript is a popular programming language for web development. It adds static types to JavaScript and is widely used.",
  },
  {
    title: "Python Programming Basics",
    content:
      "Python is another programming language known for its simplicity and readability. Great for beginners.",
  },
  {
    title: "JavaScript Fundamentals",
    content:
      "JavaScript is essential for web development, running both in browsers and on servers with Node.js.",
  },
  {
    title: "Web Development Overview",
    content:
      "Web development involves creating websites and web applications using various technologies like HTML, CSS, and JavaScript.",
  },
  {
    title: "Database Management Systems",
    content:
      "Database management is crucial for storing and retrieving data in web applications. MySQL and PostgreSQL are popular choices.",
  },
];

export const DEMO_QUERIES: readonly string[] = ["programming", "web development", "JavaScript Node", "database"];
