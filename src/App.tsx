import About from './components/About';
import Footer from './components/Footer';
import Main from './components/Main';
import Nav from './components/Nav';

export default function App() {
  return (
    <div className="main-container">
      <Nav />
      <Main
        content={[
          // TODO: Downloads, Features and Banner sections once their copy is written.
          <About css={{ color: '--red-12' }} />,
          <h1>Funny</h1>,
          <p>Content</p>,
        ]}
      />
      <Footer />
    </div>
  );
}
